/**
 * @keelway/event-store — Event Catalog.
 *
 * Formalizes all settlement events into one catalog with:
 * - Typed event definitions (type string → payload shape)
 * - Schema versions
 * - Runtime payload validation
 *
 * Unknown event types are preserved by the store; the catalog only
 * answers what it knows.
 */

import type { EventMetadata } from "@keelway/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "wallet.burn.executed") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which component emits this event */
  readonly source: EventMetadata["source"];

  /** True if the payload is valid for this version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of all settlement event types.
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "wallet.deposit.received",
 *   version: 1,
 *   description: "Tokens were deposited into the wallet",
 *   source: "wallet",
 *   validate: (p) => typeof p === "object" && p !== null && "depositor" in p,
 * });
 *
 * catalog.validate("wallet.deposit.received", event.payload);
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same version is a no-op.
   *
   * @throws {CatalogError} if the type is registered with a higher version
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version > schema.version) {
      throw new CatalogError(
        `Cannot downgrade "${schema.type}" from version ${existing.version} to ${schema.version}`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  listBySource(source: EventMetadata["source"]): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate an event payload against its registered schema.
   *
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return false;
    }
    return schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
