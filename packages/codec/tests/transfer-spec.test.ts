/**
 * Tests for the TransferSpec codec.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { bytesToHex, hashTypedData, keccak256 } from "viem";
import {
  TransferSpecView,
  decodeTransferSpec,
  encodeTransferSpec,
  transferSpecHash,
} from "../src/transfer-spec.js";
import { CodecError, isCodecError } from "../src/errors.js";
import { TYPED_DATA_TYPES, WALLET_DOMAIN, typedDataDigest } from "../src/typed-data.js";
import { makeSpec, withTrailingByte, withUint32, word } from "./fixtures.js";

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof CodecError) return err.code;
    throw err;
  }
  return "NO_ERROR";
}

describe("encodeTransferSpec", () => {
  it("writes a 340-byte header when there is no hook data", () => {
    const bytes = encodeTransferSpec(makeSpec());
    expect(bytes.length).toBe(340);
    expect(bytesToHex(bytes.subarray(0, 4))).toBe("0xca85def7");
  });

  it("appends hook data after the header", () => {
    const bytes = encodeTransferSpec(makeSpec({ hookData: "0xdeadbeef" }));
    expect(bytes.length).toBe(344);
    expect(bytesToHex(bytes.subarray(336, 340))).toBe("0x00000004");
    expect(bytesToHex(bytes.subarray(340))).toBe("0xdeadbeef");
  });

  it("writes fields big-endian at their offsets", () => {
    const bytes = encodeTransferSpec(
      makeSpec({ sourceDomain: 0x01020304, destinationDomain: 9, value: 258n }),
    );
    expect(bytesToHex(bytes.subarray(4, 8))).toBe("0x00000001");
    expect(bytesToHex(bytes.subarray(8, 12))).toBe("0x01020304");
    expect(bytesToHex(bytes.subarray(12, 16))).toBe("0x00000009");
    expect(bytesToHex(bytes.subarray(16, 48))).toBe(word("a1"));
    expect(bytesToHex(bytes.subarray(272, 304))).toBe(word("0102"));
    expect(bytesToHex(bytes.subarray(304, 336))).toBe(word("5a17"));
  });

  it("rejects out-of-range fields", () => {
    expect(codeOf(() => encodeTransferSpec(makeSpec({ sourceDomain: 2 ** 32 })))).toBe(
      "FIELD_OUT_OF_RANGE",
    );
    expect(codeOf(() => encodeTransferSpec(makeSpec({ destinationDomain: -1 })))).toBe(
      "FIELD_OUT_OF_RANGE",
    );
    expect(codeOf(() => encodeTransferSpec(makeSpec({ value: 1n << 256n })))).toBe(
      "FIELD_OUT_OF_RANGE",
    );
    expect(codeOf(() => encodeTransferSpec(makeSpec({ salt: "0x1234" })))).toBe(
      "FIELD_OUT_OF_RANGE",
    );
    expect(codeOf(() => encodeTransferSpec(makeSpec({ hookData: "0xabc" })))).toBe(
      "FIELD_OUT_OF_RANGE",
    );
  });

  it("names the offending field", () => {
    try {
      encodeTransferSpec(makeSpec({ sourceToken: "0x00" }));
      expect.unreachable();
    } catch (err) {
      expect(isCodecError(err, "FIELD_OUT_OF_RANGE")).toBe(true);
      if (isCodecError(err)) {
        expect(err.details["field"]).toBe("sourceToken");
      }
    }
  });
});

describe("TransferSpecView.cast", () => {
  it("rejects buffers shorter than the magic", () => {
    expect(codeOf(() => TransferSpecView.cast(new Uint8Array(3)))).toBe("DATA_TOO_SHORT");
  });

  it("rejects a wrong magic", () => {
    const bytes = withUint32(encodeTransferSpec(makeSpec()), 0, 0x12345678);
    try {
      TransferSpecView.cast(bytes);
      expect.unreachable();
    } catch (err) {
      expect(isCodecError(err, "INVALID_MAGIC")).toBe(true);
      if (isCodecError(err)) {
        expect(err.details).toEqual({
          kind: "TransferSpec",
          expected: "0xca85def7",
          actual: "0x12345678",
        });
      }
    }
  });

  it("does not copy the buffer", () => {
    const bytes = encodeTransferSpec(makeSpec({ hookData: "0x0102" }));
    const view = TransferSpecView.cast(bytes);
    expect(view.bytes).toBe(bytes);

    const hook = view.getHookData();
    expect(hook.buffer).toBe(bytes.buffer);
    bytes[340] = 0xff;
    expect(hook[0]).toBe(0xff);
  });

  it("accepts a bare magic and defers structure checks to validate", () => {
    const view = TransferSpecView.cast(encodeTransferSpec(makeSpec()).subarray(0, 4));
    expect(codeOf(() => view.validate())).toBe("HEADER_TOO_SHORT");
  });
});

describe("TransferSpecView.validate", () => {
  const bytes = encodeTransferSpec(makeSpec({ hookData: "0xaabbcc" }));

  it("accepts a well-formed spec", () => {
    expect(TransferSpecView.cast(bytes).validate().length).toBe(343);
  });

  it("rejects a truncated header", () => {
    expect(codeOf(() => TransferSpecView.cast(bytes.subarray(0, 339)).validate())).toBe(
      "HEADER_TOO_SHORT",
    );
  });

  it("rejects an unsupported version", () => {
    expect(codeOf(() => TransferSpecView.cast(withUint32(bytes, 4, 2)).validate())).toBe(
      "INVALID_VERSION",
    );
  });

  it("rejects a hook-data length that disagrees with the buffer", () => {
    expect(codeOf(() => TransferSpecView.cast(withUint32(bytes, 336, 4)).validate())).toBe(
      "OVERALL_LENGTH_MISMATCH",
    );
    expect(codeOf(() => TransferSpecView.cast(withTrailingByte(bytes)).validate())).toBe(
      "OVERALL_LENGTH_MISMATCH",
    );
    expect(codeOf(() => TransferSpecView.cast(bytes.subarray(0, 342)).validate())).toBe(
      "OVERALL_LENGTH_MISMATCH",
    );
  });

  it("casts a prefix bounded by the spec's own length", () => {
    expect(TransferSpecView.castPrefix(withTrailingByte(bytes)).validate().length).toBe(343);
    expect(TransferSpecView.castPrefix(bytes.subarray(0, 100)).length).toBe(100);
    expect(codeOf(() => TransferSpecView.castPrefix(bytes.subarray(0, 342)).validate())).toBe(
      "OVERALL_LENGTH_MISMATCH",
    );
  });

  it("never reads past the buffer from an accessor", () => {
    const view = TransferSpecView.cast(bytes.subarray(0, 100));
    expect(view.sourceDomain).toBe(1);
    expect(codeOf(() => view.value)).toBe("BYTES_OUT_OF_BOUNDS");
  });
});

describe("accessors", () => {
  it("read every field", () => {
    const spec = makeSpec({ value: 42n, hookData: "0x99" });
    const view = TransferSpecView.cast(encodeTransferSpec(spec)).validate();
    expect(view.version).toBe(1);
    expect(view.sourceDomain).toBe(1);
    expect(view.destinationDomain).toBe(7);
    expect(view.sourceContract).toBe(word("a1"));
    expect(view.destinationContract).toBe(word("b1"));
    expect(view.sourceToken).toBe(word("a2"));
    expect(view.destinationToken).toBe(word("b2"));
    expect(view.sourceDepositor).toBe(word("a3"));
    expect(view.destinationRecipient).toBe(word("b3"));
    expect(view.sourceSigner).toBe(word("a4"));
    expect(view.destinationCaller).toBe(word("00"));
    expect(view.value).toBe(42n);
    expect(view.salt).toBe(word("5a17"));
    expect(view.hookDataLength).toBe(1);
    expect(Array.from(view.getHookData())).toEqual([0x99]);
  });

  it("return an empty hook-data view when there is none", () => {
    const view = TransferSpecView.cast(encodeTransferSpec(makeSpec())).validate();
    expect(view.getHookData().length).toBe(0);
  });

  it("read a maximal value", () => {
    const max = (1n << 256n) - 1n;
    expect(decodeTransferSpec(encodeTransferSpec(makeSpec({ value: max }))).value).toBe(max);
  });
});

describe("hashes", () => {
  it("getHash is keccak256 of the encoded bytes", () => {
    const bytes = encodeTransferSpec(makeSpec());
    expect(TransferSpecView.cast(bytes).getHash()).toBe(keccak256(bytes));
    expect(transferSpecHash(makeSpec())).toBe(keccak256(bytes));
  });

  it("changes when any field changes", () => {
    expect(transferSpecHash(makeSpec({ salt: word("01") }))).not.toBe(
      transferSpecHash(makeSpec({ salt: word("02") })),
    );
  });

  it("getTypedDataHash matches the EIP-712 struct hash", () => {
    const spec = makeSpec({ hookData: "0x0badf00d", value: 77n });
    const view = TransferSpecView.cast(encodeTransferSpec(spec)).validate();
    const expected = hashTypedData({
      domain: { ...WALLET_DOMAIN },
      types: TYPED_DATA_TYPES,
      primaryType: "TransferSpec",
      message: spec,
    });
    expect(typedDataDigest(WALLET_DOMAIN, view.getTypedDataHash())).toBe(expected);
  });
});

describe("properties", () => {
  const arbWord = fc
    .uint8Array({ minLength: 32, maxLength: 32 })
    .map((b) => bytesToHex(b));
  const arbUint32 = fc.integer({ min: 0, max: 0xffff_ffff });
  const arbSpec = fc.record({
    version: fc.constant(1),
    sourceDomain: arbUint32,
    destinationDomain: arbUint32,
    sourceContract: arbWord,
    destinationContract: arbWord,
    sourceToken: arbWord,
    destinationToken: arbWord,
    sourceDepositor: arbWord,
    destinationRecipient: arbWord,
    sourceSigner: arbWord,
    destinationCaller: arbWord,
    value: fc.bigInt({ min: 0n, max: (1n << 256n) - 1n }),
    salt: arbWord,
    hookData: fc.uint8Array({ maxLength: 64 }).map((b) => bytesToHex(b)),
  });

  it("decode(encode(spec)) equals spec", () => {
    fc.assert(
      fc.property(arbSpec, (spec) => {
        expect(decodeTransferSpec(encodeTransferSpec(spec))).toEqual(spec);
      }),
    );
  });

  it("total length is header plus hook-data length", () => {
    fc.assert(
      fc.property(arbSpec, (spec) => {
        const view = TransferSpecView.cast(encodeTransferSpec(spec)).validate();
        expect(view.hookDataLength).toBe((spec.hookData.length - 2) / 2);
        expect(view.length).toBe(340 + view.hookDataLength);
      }),
    );
  });

  it("rejects any length change", () => {
    fc.assert(
      fc.property(arbSpec, fc.integer({ min: 1, max: 16 }), (spec, delta) => {
        const bytes = encodeTransferSpec(spec);
        const grown = new Uint8Array(bytes.length + delta);
        grown.set(bytes);
        expect(codeOf(() => TransferSpecView.cast(grown).validate())).toBe(
          "OVERALL_LENGTH_MISMATCH",
        );
        const shrunk = bytes.subarray(0, bytes.length - Math.min(delta, bytes.length - 4));
        expect(codeOf(() => TransferSpecView.cast(shrunk).validate())).not.toBe("NO_ERROR");
      }),
    );
  });

  it("re-encoding identical fields yields the identical hash", () => {
    fc.assert(
      fc.property(arbSpec, (spec) => {
        expect(transferSpecHash({ ...spec })).toBe(transferSpecHash(spec));
      }),
    );
  });
});
