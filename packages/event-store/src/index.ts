/**
 * @keelway/event-store — Append-only settlement event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain over every event
 * - EventCatalog for schema registration and payload validation,
 *   which the gateway applies to every event it records
 * - Settlement event definitions for the wallet and minter
 *
 * @packageDocumentation
 */

// Core types
export type {
  UnhashedEvent,
  StoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  SubscriberErrorHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";
export { InMemoryEventStore } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Settlement events
export {
  SETTLEMENT_EVENTS,
  SETTLEMENT_EVENT_SCHEMAS,
  createSettlementCatalog,
} from "./settlement-events.js";
export type {
  SettlementEventType,
  SettlementEventPayloads,
  DepositedPayload,
  WithdrawalInitiatedPayload,
  WithdrawalCompletedPayload,
  GatewayBurnedPayload,
  InsufficientBalancePayload,
  SignerChangedPayload,
  FeeRecipientChangedPayload,
  DelegateChangedPayload,
  TokenSupportedPayload,
  WithdrawalDelayChangedPayload,
  AttestationUsedPayload,
} from "./settlement-events.js";
