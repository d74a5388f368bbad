/**
 * Byte-string Types
 *
 * Hex-encoded primitives shared by every Keelway package.
 *
 * Rules:
 * - Case-insensitive, always `0x`-prefixed
 * - A Bytes32 is exactly 32 bytes (64 hex characters)
 * - An Address is exactly 20 bytes; on the wire it travels as a
 *   left-padded Bytes32
 */

/** Any `0x`-prefixed hex string. */
export type Hex = `0x${string}`;

/** A 32-byte word, hex-encoded. */
export type Bytes32 = Hex;

/** A 20-byte EVM address, hex-encoded. */
export type Address = Hex;

/** Opaque identifier of a chain participating in transfers. */
export type DomainId = number;

/** Upper bound of a uint32 field. */
export const MAX_UINT32 = 0xffff_ffff;

/** Upper bound of a uint256 field. */
export const MAX_UINT256 = (1n << 256n) - 1n;

/** The all-zero 32-byte word. */
export const ZERO_BYTES32: Bytes32 =
  "0x0000000000000000000000000000000000000000000000000000000000000000";
