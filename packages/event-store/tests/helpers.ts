/**
 * Shared event builders for event-store tests.
 */

import type { DomainEvent } from "@keelway/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
  correlationId = "call-1",
): DomainEvent {
  counter++;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2025-03-01T00:00:00.000Z",
      actor: "0x00000000000000000000000000000000000000a1",
      correlationId,
      source: "wallet",
      blockHeight: "100",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "wallet.test"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}
