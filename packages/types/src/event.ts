/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state change on a ledger is captured as a DomainEvent, and the
 * event stream is the only thing another ledger's relayer can observe.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Events are replayable: same events → same state
 * - No UPDATE, no DELETE — only new events
 */

import type { ChainId } from "./identity.js";

/**
 * Which component emitted an event.
 */
export type EventSource = "ledger" | "swap" | "lock" | "gate";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp (ledger time, not wall-clock) */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups related events; the hash lock for swap and lock events */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;

  /** Ledger that emitted the event */
  readonly chainId: ChainId;

  /** Ledger height at which the event was emitted */
  readonly height: number;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "swap.initiated", "lock.completed") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
