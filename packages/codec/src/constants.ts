/**
 * @keelway/codec — Wire-format constants.
 *
 * Magic values, versions, field offsets and header lengths for every
 * payload kind. All multi-byte integers are big-endian; every address
 * travels as a left-padded 32-byte word.
 *
 * These values are agreed out-of-band between encoders and decoders on
 * every domain. Changing any of them is a wire-format break.
 */

// ─── Shared ──────────────────────────────────────────────────────────────

/** Every payload starts with a 4-byte magic. */
export const MAGIC_LENGTH = 4;

/** Minimum length accepted by any cast: the magic itself. */
export const MIN_CAST_LENGTH = MAGIC_LENGTH;

/** Largest count or length a uint32 field can carry. */
export const MAX_UINT32_VALUE = 0xffff_ffff;

/** Current (and only) supported version of every payload kind. */
export const CURRENT_VERSION = 1;

// ─── TransferSpec ────────────────────────────────────────────────────────

export const TRANSFER_SPEC = Object.freeze({
  MAGIC: 0xca85def7,
  VERSION: CURRENT_VERSION,
  MAGIC_OFFSET: 0,
  VERSION_OFFSET: 4,
  SOURCE_DOMAIN_OFFSET: 8,
  DESTINATION_DOMAIN_OFFSET: 12,
  SOURCE_CONTRACT_OFFSET: 16,
  DESTINATION_CONTRACT_OFFSET: 48,
  SOURCE_TOKEN_OFFSET: 80,
  DESTINATION_TOKEN_OFFSET: 112,
  SOURCE_DEPOSITOR_OFFSET: 144,
  DESTINATION_RECIPIENT_OFFSET: 176,
  SOURCE_SIGNER_OFFSET: 208,
  DESTINATION_CALLER_OFFSET: 240,
  VALUE_OFFSET: 272,
  SALT_OFFSET: 304,
  HOOK_DATA_LENGTH_OFFSET: 336,
  HOOK_DATA_OFFSET: 340,
  /** Fixed header length; hook data follows. */
  HEADER_LENGTH: 340,
});

// ─── BurnIntent ──────────────────────────────────────────────────────────

export const BURN_INTENT = Object.freeze({
  MAGIC: 0x070afbc2,
  VERSION: CURRENT_VERSION,
  MAGIC_OFFSET: 0,
  VERSION_OFFSET: 4,
  MAX_BLOCK_HEIGHT_OFFSET: 8,
  MAX_FEE_OFFSET: 40,
  TRANSFER_SPEC_LENGTH_OFFSET: 72,
  TRANSFER_SPEC_OFFSET: 76,
  HEADER_LENGTH: 76,
});

// ─── Attestation ─────────────────────────────────────────────────────────

export const ATTESTATION = Object.freeze({
  MAGIC: 0xff6fb334,
  VERSION: CURRENT_VERSION,
  MAGIC_OFFSET: 0,
  VERSION_OFFSET: 4,
  TRANSFER_SPEC_LENGTH_OFFSET: 8,
  TRANSFER_SPEC_OFFSET: 12,
  HEADER_LENGTH: 12,
});

// ─── Sets ────────────────────────────────────────────────────────────────

export const PAYLOAD_SET = Object.freeze({
  MAGIC_OFFSET: 0,
  VERSION_OFFSET: 4,
  NUM_ELEMENTS_OFFSET: 8,
  ELEMENTS_OFFSET: 12,
  HEADER_LENGTH: 12,
});

export const BURN_INTENT_SET = Object.freeze({
  ...PAYLOAD_SET,
  MAGIC: 0x4ef7e5c4,
  VERSION: CURRENT_VERSION,
});

export const ATTESTATION_SET = Object.freeze({
  ...PAYLOAD_SET,
  MAGIC: 0x1e12db71,
  VERSION: CURRENT_VERSION,
});

/**
 * Format a magic value the way errors and logs print it.
 */
export function formatMagic(magic: number): string {
  return `0x${magic.toString(16).padStart(8, "0")}`;
}
