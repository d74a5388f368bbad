/**
 * @keelway/gateway — Settlement event recording.
 *
 * A wallet or minter call records its events into a PendingEvents
 * buffer. The buffer reaches the event store only when the call
 * commits; a call that throws leaves the stream untouched.
 *
 * Every event of one call shares a correlation id and the block height
 * the call executed at. Payloads are checked against the settlement
 * catalog as they are recorded, so a malformed event fails the call
 * before anything is committed.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@keelway/types";
import {
  createSettlementCatalog,
  type EventCatalog,
  type EventStore,
  type SettlementEventPayloads,
  type SettlementEventType,
} from "@keelway/event-store";
import type { BlockClock } from "@keelway/ledger";
import { GatewayError } from "./errors.js";

const SETTLEMENT_CATALOG: EventCatalog = createSettlementCatalog();

export class PendingEvents {
  readonly correlationId: string = randomUUID();
  private readonly _events: DomainEvent[] = [];

  constructor(
    private readonly _source: EventSource,
    private readonly _actor: string,
    private readonly _blockHeight: bigint,
  ) {}

  record<T extends SettlementEventType>(
    type: T,
    payload: SettlementEventPayloads[T] & Readonly<Record<string, unknown>>,
  ): void {
    if (!SETTLEMENT_CATALOG.validate(type, payload)) {
      throw new GatewayError("INVALID_EVENT_PAYLOAD", `Payload does not match the ${type} schema`, {
        eventType: type,
      });
    }
    this._events.push({
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date().toISOString(),
        actor: this._actor,
        correlationId: this.correlationId,
        source: this._source,
        blockHeight: this._blockHeight.toString(),
      },
      payload,
    });
  }

  get events(): readonly DomainEvent[] {
    return this._events;
  }
}

export class EventRecorder {
  constructor(
    private readonly _store: EventStore,
    readonly streamId: string,
    private readonly _source: EventSource,
    private readonly _clock: BlockClock,
  ) {}

  begin(actor: string): PendingEvents {
    return new PendingEvents(this._source, actor, this._clock.currentBlock());
  }

  commit(pending: PendingEvents): void {
    if (pending.events.length === 0) return;
    this._store.append(this.streamId, pending.events);
  }
}
