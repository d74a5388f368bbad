/**
 * @keelway/event-store — In-memory settlement event log.
 *
 * Backs the settlement service, whose wallet and minter state is itself
 * in memory, and every test. Each stream is a wallet or minter
 * deployment (`wallet:<address>`, `minter:<address>`); all streams
 * share one global log and one hash chain.
 *
 * Appends are all-or-nothing: the batch is hashed into a scratch list
 * and only linked into the logs once every event has its hash.
 * Subscribers run after that, one at a time; a subscriber that throws
 * is reported to `onSubscriberError` and the remaining subscribers
 * still run.
 */

import type { DomainEvent } from "@keelway/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  SubscriberErrorHandler,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Called for every error a subscriber throws. */
  readonly onSubscriberError?: SubscriberErrorHandler;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _log: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _onSubscriberError: SubscriberErrorHandler | undefined;
  private _subscriberFailures = 0;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._onSubscriberError = options.onSubscriberError;
  }

  /** How many times a subscriber has thrown since the store was created. */
  get subscriberFailures(): number {
    return this._subscriberFailures;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    assertStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    const fromVersion = stream.length + 1;
    const appendedAt = new Date().toISOString();

    const linked: StoredEvent[] = [];
    let previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;
    for (const [i, { type, metadata, payload }] of events.entries()) {
      const base = {
        event: { type, metadata, payload },
        streamId,
        version: fromVersion + i,
        globalPosition: this._log.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      linked.push({ ...base, hash, previousHash });
      previousHash = hash;
    }

    stream.push(...linked);
    this._streams.set(streamId, stream);
    this._log.push(...linked);

    this._dispatch(linked);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + linked.length - 1,
      count: linked.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options: ReadOptions = {}): readonly StoredEvent[] {
    assertStreamId(streamId);
    const fromVersion = options.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }
    return (this._streams.get(streamId) ?? []).slice(fromVersion - 1);
  }

  readAll(options: ReadAllOptions = {}): readonly StoredEvent[] {
    const fromIndex = Math.max((options.fromPosition ?? 1) - 1, 0);
    const events = this._log.slice(fromIndex);
    if (options.types === undefined) return events;

    const types = new Set(options.types);
    return events.filter((e) => types.has(e.event.type));
  }

  streamExists(streamId: string): boolean {
    return (this._streams.get(streamId)?.length ?? 0) > 0;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const handler of [...this._subscribers]) {
      for (const event of events) {
        try {
          handler(event);
        } catch (err) {
          this._subscriberFailures++;
          this._onSubscriberError?.(err, event);
        }
      }
    }
  }
}

function assertStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}
