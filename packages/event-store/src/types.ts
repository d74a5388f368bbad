/**
 * @keelway/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by hash
 */

import type { DomainEvent, EventMetadata } from "@keelway/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store, before hash-chain linking.
 */
export interface UnhashedEvent {
  /** The domain event */
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<Record<string, unknown>>;
  }>;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A persisted event linked into the global hash chain.
 */
export interface StoredEvent extends UnhashedEvent {
  /** SHA-256 over the canonical event content and `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH for the first */
  readonly previousHash: string;
}

// =============================================================================
// Append and Read
// =============================================================================

export interface AppendResult {
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  readonly count: number;
}

export interface ReadOptions {
  /** First version to return (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;
}

export interface ReadAllOptions {
  /** First global position to return (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Only events of these types */
  readonly types?: readonly string[];
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback for event subscriptions. Called synchronously on append,
 * after the events are persisted.
 */
export type EventHandler = (event: StoredEvent) => void;

/**
 * Receives the error a subscriber threw. The append that delivered the
 * event has already succeeded and is not undone.
 */
export type SubscriberErrorHandler = (error: unknown, event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash checked out */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - An append either persists every event or none
 * - A failing subscriber never fails the append that fed it
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError for an empty batch or stream ID
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /** Events of one stream; empty if the stream doesn't exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
