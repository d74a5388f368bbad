/**
 * Event Types
 *
 * Append-only settlement event architecture.
 * Every state change in a wallet or minter is captured as a DomainEvent,
 * which is what off-chain indexers consume.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which call)
 * - Payload values are JSON-safe: integers wider than 2^53 travel as
 *   decimal strings
 */

/** Which settlement component emitted an event. */
export type EventSource = "wallet" | "minter";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event (an address, or "system") */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups every event emitted by one call */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;

  /** Block height at which the emitting call executed */
  readonly blockHeight: string;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "wallet.burn.executed") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
