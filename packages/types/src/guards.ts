/**
 * Runtime Type Guards
 *
 * Narrowing functions for Keelway primitives.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, external integrations).
 */

import type { Address, Bytes32, Hex } from "./hex.js";
import { MAX_UINT256, MAX_UINT32 } from "./hex.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Byte-string guards
// =============================================================================

const HEX_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

export function isBytes32(value: unknown): value is Bytes32 {
  return isHex(value) && value.length === 66;
}

export function isAddress(value: unknown): value is Address {
  return isHex(value) && value.length === 42;
}

// =============================================================================
// Integer guards
// =============================================================================

export function isUint32(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_UINT32
  );
}

export function isUint256(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= MAX_UINT256;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["wallet", "minter"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source) &&
    typeof v.blockHeight === "string"
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
