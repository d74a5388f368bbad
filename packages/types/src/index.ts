/**
 * @keelway/types — Shared domain types for the Keelway stack.
 *
 * These types are used across all Keelway packages:
 * - Hex-encoded byte strings (words, addresses)
 * - Settlement event architecture
 * - Runtime guards for system boundaries
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Byte-string types
export type { Hex, Bytes32, Address, DomainId } from "./hex.js";
export { MAX_UINT32, MAX_UINT256, ZERO_BYTES32 } from "./hex.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isHex,
  isBytes32,
  isAddress,
  isUint32,
  isUint256,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
