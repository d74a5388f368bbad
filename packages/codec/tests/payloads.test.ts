/**
 * Tests for BurnIntent and Attestation payloads.
 */

import { describe, it, expect } from "vitest";
import { bytesToHex, hashTypedData } from "viem";
import { BurnIntentView, decodeBurnIntent, encodeBurnIntent } from "../src/burn-intent.js";
import {
  AttestationView,
  decodeAttestation,
  encodeAttestation,
} from "../src/attestation.js";
import { encodeTransferSpec } from "../src/transfer-spec.js";
import { CodecError, isCodecError } from "../src/errors.js";
import {
  MINTER_DOMAIN,
  WALLET_DOMAIN,
  attestationTypedData,
  burnIntentTypedData,
  typedDataDigest,
} from "../src/typed-data.js";
import {
  makeAttestation,
  makeIntent,
  makeSpec,
  withTrailingByte,
  withUint32,
} from "./fixtures.js";

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof CodecError) return err.code;
    throw err;
  }
  return "NO_ERROR";
}

// =============================================================================
// BurnIntent
// =============================================================================

describe("BurnIntent", () => {
  const intent = makeIntent({ spec: makeSpec({ hookData: "0x0102" }) });
  const bytes = encodeBurnIntent(intent);

  it("encodes header, fields and embedded spec", () => {
    expect(bytes.length).toBe(76 + 342);
    expect(bytesToHex(bytes.subarray(0, 4))).toBe("0x070afbc2");
    expect(bytesToHex(bytes.subarray(72, 76))).toBe("0x00000156");
    expect(bytes.subarray(76)).toEqual(encodeTransferSpec(intent.spec));
  });

  it("round-trips", () => {
    expect(decodeBurnIntent(bytes)).toEqual(intent);
  });

  it("exposes maxBlockHeight and maxFee", () => {
    const view = BurnIntentView.from(bytes);
    expect(view.maxBlockHeight).toBe(500n);
    expect(view.maxFee).toBe(2_000n);
    expect(view.spec.value).toBe(1_000_000n);
    expect(view.length).toBe(bytes.length);
  });

  it("shares memory with the input", () => {
    const view = BurnIntentView.from(bytes);
    expect(view.spec.bytes.buffer).toBe(bytes.buffer);
  });

  it("rejects a TransferSpec passed as an intent", () => {
    expect(codeOf(() => BurnIntentView.cast(encodeTransferSpec(makeSpec())))).toBe(
      "INVALID_MAGIC",
    );
  });

  it("rejects a short buffer", () => {
    expect(codeOf(() => BurnIntentView.cast(new Uint8Array(2)))).toBe("DATA_TOO_SHORT");
    expect(codeOf(() => BurnIntentView.from(bytes.subarray(0, 75)))).toBe(
      "HEADER_TOO_SHORT",
    );
  });

  it("rejects an unsupported own version", () => {
    expect(codeOf(() => BurnIntentView.from(withUint32(bytes, 4, 3)))).toBe(
      "INVALID_VERSION",
    );
  });

  it("propagates embedded spec errors", () => {
    expect(codeOf(() => BurnIntentView.from(withUint32(bytes, 76 + 4, 2)))).toBe(
      "INVALID_VERSION",
    );
    expect(codeOf(() => BurnIntentView.from(withUint32(bytes, 76, 0xdeadbeef)))).toBe(
      "INVALID_MAGIC",
    );
  });

  it("rejects a declared spec length that disagrees with the buffer", () => {
    expect(codeOf(() => BurnIntentView.from(withUint32(bytes, 72, 343)))).toBe(
      "TRANSFER_PAYLOAD_OVERALL_LENGTH_MISMATCH",
    );
    expect(codeOf(() => BurnIntentView.from(withTrailingByte(bytes)))).toBe(
      "TRANSFER_PAYLOAD_OVERALL_LENGTH_MISMATCH",
    );
  });

  it("reports expected and actual lengths", () => {
    try {
      BurnIntentView.from(withTrailingByte(bytes));
      expect.unreachable();
    } catch (err) {
      expect(isCodecError(err)).toBe(true);
      if (isCodecError(err)) {
        expect(err.details["expected"]).toBe(418);
        expect(err.details["actual"]).toBe(419);
      }
    }
  });

  it("rejects out-of-range fee fields at encode time", () => {
    expect(codeOf(() => encodeBurnIntent(makeIntent({ maxFee: -1n })))).toBe(
      "FIELD_OUT_OF_RANGE",
    );
    expect(codeOf(() => encodeBurnIntent(makeIntent({ maxBlockHeight: 1n << 256n })))).toBe(
      "FIELD_OUT_OF_RANGE",
    );
  });

  it("typed-data hash matches the EIP-712 BurnIntent struct", () => {
    const view = BurnIntentView.from(bytes);
    expect(typedDataDigest(WALLET_DOMAIN, view.getTypedDataHash())).toBe(
      hashTypedData(burnIntentTypedData(intent)),
    );
  });
});

// =============================================================================
// Attestation
// =============================================================================

describe("Attestation", () => {
  const attestation = makeAttestation(makeSpec({ destinationDomain: 3 }));
  const bytes = encodeAttestation(attestation);

  it("encodes header and embedded spec", () => {
    expect(bytes.length).toBe(12 + 340);
    expect(bytesToHex(bytes.subarray(0, 4))).toBe("0xff6fb334");
    expect(bytesToHex(bytes.subarray(8, 12))).toBe("0x00000154");
  });

  it("round-trips", () => {
    expect(decodeAttestation(bytes)).toEqual(attestation);
  });

  it("rejects a BurnIntent passed as an attestation", () => {
    expect(codeOf(() => AttestationView.cast(encodeBurnIntent(makeIntent())))).toBe(
      "INVALID_MAGIC",
    );
  });

  it("rejects a truncated embedded spec", () => {
    expect(codeOf(() => AttestationView.from(bytes.subarray(0, 200)))).toBe(
      "HEADER_TOO_SHORT",
    );
  });

  it("rejects a declared spec length shorter than a well-formed spec", () => {
    try {
      AttestationView.from(withUint32(bytes, 8, 339));
      expect.unreachable();
    } catch (err) {
      expect(isCodecError(err)).toBe(true);
      if (isCodecError(err)) {
        expect(err.code).toBe("TRANSFER_PAYLOAD_OVERALL_LENGTH_MISMATCH");
        expect(err.details).toEqual({
          kind: "Attestation",
          expected: 351,
          actual: 352,
          declaredSpecLength: 339,
          actualSpecLength: 340,
        });
      }
    }
  });

  it("rejects a declared spec length longer than a well-formed spec", () => {
    expect(codeOf(() => AttestationView.from(withUint32(bytes, 8, 341)))).toBe(
      "TRANSFER_PAYLOAD_OVERALL_LENGTH_MISMATCH",
    );
  });

  it("typed-data hash matches the EIP-712 Attestation struct", () => {
    const view = AttestationView.from(bytes);
    expect(typedDataDigest(MINTER_DOMAIN, view.getTypedDataHash())).toBe(
      hashTypedData(attestationTypedData(attestation)),
    );
  });
});
