/**
 * @keelway/codec — BurnIntent codec.
 *
 * Layout: magic ‖ version ‖ maxBlockHeight ‖ maxFee ‖ transferSpecLength ‖ TransferSpec
 *
 * A BurnIntent is what a depositor (or their delegate) signs on the
 * source domain: "burn this TransferSpec's value from my balance, before
 * `maxBlockHeight`, paying at most `maxFee`".
 */

import { concat, hexToBytes, keccak256, type Hex } from "viem";
import { BURN_INTENT } from "./constants.js";
import { readSlice, readUint256, writeBytes, writeUint256, writeUint32 } from "./bytes.js";
import { assertUint256Field, assertUint32Field } from "./fields.js";
import { assertCastable, encodeTransferSpec } from "./transfer-spec.js";
import { TransferPayloadView, type TransferPayloadLayout } from "./transfer-payload.js";
import { BURN_INTENT_TYPEHASH } from "./typed-data.js";
import type { BurnIntent } from "./types.js";

const B = BURN_INTENT;

export const BURN_INTENT_LAYOUT: TransferPayloadLayout = Object.freeze({
  kind: "BurnIntent",
  ...B,
});

export class BurnIntentView extends TransferPayloadView {
  private constructor(bytes: Uint8Array) {
    super(bytes, BURN_INTENT_LAYOUT);
  }

  /**
   * Wrap `bytes` after checking its length and magic.
   * @throws {CodecError} DATA_TOO_SHORT, INVALID_MAGIC
   */
  static cast(bytes: Uint8Array): BurnIntentView {
    assertCastable(bytes, B.MAGIC, "BurnIntent");
    return new BurnIntentView(bytes);
  }

  /** Cast and validate in one step. */
  static from(bytes: Uint8Array): BurnIntentView {
    return BurnIntentView.cast(bytes).validate();
  }

  get maxBlockHeight(): bigint {
    return readUint256(this.bytes, B.MAX_BLOCK_HEIGHT_OFFSET);
  }

  get maxFee(): bigint {
    return readUint256(this.bytes, B.MAX_FEE_OFFSET);
  }

  getTypedDataHash(): Hex {
    // maxBlockHeight and maxFee are already two big-endian 32-byte words
    const fields = readSlice(
      this.bytes,
      B.MAX_BLOCK_HEIGHT_OFFSET,
      B.TRANSFER_SPEC_LENGTH_OFFSET - B.MAX_BLOCK_HEIGHT_OFFSET,
    );
    return keccak256(
      concat([
        hexToBytes(BURN_INTENT_TYPEHASH),
        fields,
        hexToBytes(this.spec.getTypedDataHash()),
      ]),
    );
  }

  toBurnIntent(): BurnIntent {
    return {
      version: B.VERSION,
      maxBlockHeight: this.maxBlockHeight,
      maxFee: this.maxFee,
      spec: this.spec.toTransferSpec(),
    };
  }
}

/**
 * Serialize a BurnIntent.
 *
 * @throws {CodecError} FIELD_OUT_OF_RANGE, HOOK_DATA_TOO_LARGE
 */
export function encodeBurnIntent(intent: BurnIntent): Uint8Array {
  assertUint32Field("version", intent.version);
  assertUint256Field("maxBlockHeight", intent.maxBlockHeight);
  assertUint256Field("maxFee", intent.maxFee);
  const spec = encodeTransferSpec(intent.spec);

  const out = new Uint8Array(B.HEADER_LENGTH + spec.length);
  writeUint32(out, B.MAGIC_OFFSET, B.MAGIC);
  writeUint32(out, B.VERSION_OFFSET, intent.version);
  writeUint256(out, B.MAX_BLOCK_HEIGHT_OFFSET, intent.maxBlockHeight);
  writeUint256(out, B.MAX_FEE_OFFSET, intent.maxFee);
  writeUint32(out, B.TRANSFER_SPEC_LENGTH_OFFSET, spec.length);
  writeBytes(out, B.TRANSFER_SPEC_OFFSET, spec);
  return out;
}

export function decodeBurnIntent(bytes: Uint8Array): BurnIntent {
  return BurnIntentView.from(bytes).toBurnIntent();
}
