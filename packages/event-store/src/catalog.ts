/**
 * @hashlock/event-store — Event Catalog.
 *
 * Registry of every event type a pool can emit, with:
 * - Typed event definitions (type string → payload shape)
 * - A schema version per event type
 * - Runtime payload validation for consumers reading the stream
 *
 * Design principles:
 * - Events are immutable after creation (no schema changes retroactively)
 * - New versions are additive (new fields, never removed fields)
 * - Unknown event types are preserved, never rejected at read time
 */

import type { DomainEvent, EventSource } from "@hashlock/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

/**
 * Defines a versioned event schema.
 */
export interface EventSchema {
  /** Event type string (e.g., "swap.initiated") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which component emits this event */
  readonly source: EventSource;

  /**
   * Validate a payload against the current schema version.
   */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of domain event types.
 *
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "lock.refunded",
 *   version: 1,
 *   description: "An expired counterparty lock was refunded",
 *   source: "lock",
 *   validate: (p) => typeof p === "object" && p !== null && "hashLock" in p,
 * });
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op. A different version with
   * a lower number than the one registered is rejected.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }

    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && schema.version < existing.version) {
      throw new CatalogError(
        `Cannot downgrade "${schema.type}" from version ${existing.version} to ${schema.version}`,
      );
    }
    if (existing !== undefined && schema.version === existing.version) {
      return;
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

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate an event payload against its registered schema.
   * Unregistered types are invalid.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  /**
   * Validate a whole event, throwing when its type is unknown or its
   * payload does not match.
   */
  assertValid(event: DomainEvent): void {
    const schema = this._schemas.get(event.type);
    if (schema === undefined) {
      throw new CatalogError(`Unknown event type "${event.type}"`);
    }
    if (schema.source !== event.metadata.source) {
      throw new CatalogError(
        `Event "${event.type}" must come from "${schema.source}", got "${event.metadata.source}"`,
      );
    }
    if (!schema.validate(event.payload)) {
      throw new CatalogError(`Invalid payload for "${event.type}" (v${schema.version})`);
    }
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
