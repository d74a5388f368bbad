/**
 * @keelway/codec — Burn batch envelope.
 *
 * A burn call carries parallel arrays of encoded payloads (BurnIntent or
 * BurnIntentSet), their depositor signatures, and per-element fees. The
 * burn signer signs `keccak256` of the ABI encoding of those three
 * arrays.
 */

import { decodeAbiParameters, encodeAbiParameters, keccak256, type Hex } from "viem";
import { CodecError } from "./errors.js";

export interface BurnBatch {
  readonly intents: readonly Hex[];
  readonly signatures: readonly Hex[];
  readonly fees: readonly (readonly bigint[])[];
}

const BURN_BATCH_PARAMS = [
  { name: "intents", type: "bytes[]" },
  { name: "signatures", type: "bytes[]" },
  { name: "fees", type: "uint256[][]" },
] as const;

export function encodeBurnBatch(batch: BurnBatch): Hex {
  return encodeAbiParameters(BURN_BATCH_PARAMS, [batch.intents, batch.signatures, batch.fees]);
}

/**
 * @throws {CodecError} MALFORMED_BURN_BATCH when `encoded` is not a valid
 *   `(bytes[], bytes[], uint256[][])` encoding
 */
export function decodeBurnBatch(encoded: Hex): BurnBatch {
  try {
    const [intents, signatures, fees] = decodeAbiParameters(BURN_BATCH_PARAMS, encoded);
    return { intents, signatures, fees };
  } catch (err) {
    throw new CodecError(
      "MALFORMED_BURN_BATCH",
      `Burn batch is not a valid ABI encoding: ${err instanceof Error ? err.message : String(err)}`,
      { length: encoded.length },
    );
  }
}

/** The hash a burn signer signs for `batch`. */
export function burnBatchDigest(batch: BurnBatch): Hex {
  return keccak256(encodeBurnBatch(batch));
}
