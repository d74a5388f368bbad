/**
 * @keelway/codec — Attestation codec.
 *
 * Layout: magic ‖ version ‖ transferSpecLength ‖ TransferSpec
 *
 * An Attestation carries the same TransferSpec bytes as the BurnIntent
 * it settles, so the minter derives the identical spec hash.
 */

import { concat, hexToBytes, keccak256, type Hex } from "viem";
import { ATTESTATION } from "./constants.js";
import { writeBytes, writeUint32 } from "./bytes.js";
import { assertUint32Field } from "./fields.js";
import { assertCastable, encodeTransferSpec } from "./transfer-spec.js";
import { TransferPayloadView, type TransferPayloadLayout } from "./transfer-payload.js";
import { ATTESTATION_TYPEHASH } from "./typed-data.js";
import type { Attestation } from "./types.js";

const A = ATTESTATION;

export const ATTESTATION_LAYOUT: TransferPayloadLayout = Object.freeze({
  kind: "Attestation",
  ...A,
});

export class AttestationView extends TransferPayloadView {
  private constructor(bytes: Uint8Array) {
    super(bytes, ATTESTATION_LAYOUT);
  }

  /**
   * Wrap `bytes` after checking its length and magic.
   * @throws {CodecError} DATA_TOO_SHORT, INVALID_MAGIC
   */
  static cast(bytes: Uint8Array): AttestationView {
    assertCastable(bytes, A.MAGIC, "Attestation");
    return new AttestationView(bytes);
  }

  static from(bytes: Uint8Array): AttestationView {
    return AttestationView.cast(bytes).validate();
  }

  getTypedDataHash(): Hex {
    return keccak256(
      concat([hexToBytes(ATTESTATION_TYPEHASH), hexToBytes(this.spec.getTypedDataHash())]),
    );
  }

  toAttestation(): Attestation {
    return { version: A.VERSION, spec: this.spec.toTransferSpec() };
  }
}

export function encodeAttestation(attestation: Attestation): Uint8Array {
  assertUint32Field("version", attestation.version);
  const spec = encodeTransferSpec(attestation.spec);

  const out = new Uint8Array(A.HEADER_LENGTH + spec.length);
  writeUint32(out, A.MAGIC_OFFSET, A.MAGIC);
  writeUint32(out, A.VERSION_OFFSET, attestation.version);
  writeUint32(out, A.TRANSFER_SPEC_LENGTH_OFFSET, spec.length);
  writeBytes(out, A.TRANSFER_SPEC_OFFSET, spec);
  return out;
}

export function decodeAttestation(bytes: Uint8Array): Attestation {
  return AttestationView.from(bytes).toAttestation();
}
