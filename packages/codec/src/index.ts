/**
 * @keelway/codec — Binary codec for cross-domain transfer payloads.
 *
 * Encodes, casts and validates TransferSpec, BurnIntent, Attestation
 * and their sets, and computes the hashes that signers sign and the
 * replay guard records.
 *
 * Design rules:
 * - Views are zero-copy: they wrap the caller's buffer
 * - Casting checks magic only; `validate()` checks structure
 * - Every read is bound-checked
 * - Malformed input always throws a CodecError, never coerces
 */

// Constants
export {
  TRANSFER_SPEC,
  BURN_INTENT,
  ATTESTATION,
  PAYLOAD_SET,
  BURN_INTENT_SET,
  ATTESTATION_SET,
  CURRENT_VERSION,
  MAX_UINT32_VALUE,
  formatMagic,
} from "./constants.js";

// Errors
export type { CodecErrorCode, CodecErrorDetails } from "./errors.js";
export { CodecError, isCodecError } from "./errors.js";

// Values
export type { TransferSpec, BurnIntent, Attestation } from "./types.js";

// TransferSpec
export {
  TransferSpecView,
  encodeTransferSpec,
  decodeTransferSpec,
  transferSpecHash,
} from "./transfer-spec.js";

// Payloads
export type { TransferPayloadLayout } from "./transfer-payload.js";
export { TransferPayloadView } from "./transfer-payload.js";
export {
  BurnIntentView,
  BURN_INTENT_LAYOUT,
  encodeBurnIntent,
  decodeBurnIntent,
} from "./burn-intent.js";
export {
  AttestationView,
  ATTESTATION_LAYOUT,
  encodeAttestation,
  decodeAttestation,
} from "./attestation.js";

// Sets
export type { PayloadSetLayout, ElementSpan } from "./payload-set.js";
export {
  BURN_INTENT_SET_LAYOUT,
  ATTESTATION_SET_LAYOUT,
  castPayloadSet,
  validatePayloadSet,
  payloadSetTypedDataHash,
  encodeBurnIntentSet,
  encodeAttestationSet,
} from "./payload-set.js";

// Cursor
export {
  PayloadCursor,
  openBurnIntentCursor,
  openAttestationCursor,
  decodeBurnIntentSet,
  decodeAttestationSet,
} from "./cursor.js";

// EIP-712
export type { Eip712Domain, KeelwayTypedData } from "./typed-data.js";
export {
  TRANSFER_SPEC_TYPE,
  BURN_INTENT_TYPE,
  BURN_INTENT_SET_TYPE,
  ATTESTATION_TYPE,
  ATTESTATION_SET_TYPE,
  TRANSFER_SPEC_TYPEHASH,
  BURN_INTENT_TYPEHASH,
  BURN_INTENT_SET_TYPEHASH,
  ATTESTATION_TYPEHASH,
  ATTESTATION_SET_TYPEHASH,
  WALLET_DOMAIN,
  MINTER_DOMAIN,
  TYPED_DATA_TYPES,
  domainSeparator,
  typedDataDigest,
  hashStructArray,
  burnIntentTypedData,
  burnIntentSetTypedData,
  attestationTypedData,
  attestationSetTypedData,
} from "./typed-data.js";

// Addresses
export {
  addressToBytes32,
  bytes32ToAddress,
  tryBytes32ToAddress,
  sameBytes32,
} from "./address.js";

// Burn batch
export type { BurnBatch } from "./burn-batch.js";
export { encodeBurnBatch, decodeBurnBatch, burnBatchDigest } from "./burn-batch.js";
