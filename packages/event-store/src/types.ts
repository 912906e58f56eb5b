/**
 * @hashlock/event-store — Core types.
 *
 * Defines the interfaces and types for the append-only event stream each
 * ledger publishes. The stream is the only coupling between two ledgers:
 * a relayer subscribes to one ledger's stream and acts on the other.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by hash
 * - Subscribers run after the append is committed
 */

import type { DomainEvent } from "@hashlock/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 * - hash / previousHash: tamper-evident chain over the global log
 */
export interface StoredEvent {
  /** The domain event */
  readonly event: DomainEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 over the canonical event content and `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH for position 1 */
  readonly previousHash: string;
}

/**
 * The fields of a StoredEvent that are covered by its hash.
 */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist (first write)
 * - "any": no concurrency check (append regardless)
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  /** Version of the first event appended */
  readonly fromVersion: number;
  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;
  readonly count: number;
}

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Reading direction. Default: "forward" */
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Reading direction. Default: "forward" */
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback for event subscriptions.
 * Handlers run synchronously inside `append`, after the events are stored.
 * An error a handler throws does not reach the writer.
 */
export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
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
 * - Optimistic concurrency control prevents lost writes
 * - Subscriptions are guaranteed to see events in order
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if the stream ID is empty, no events are given,
   *   or the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Read events from a single stream (empty if the stream doesn't exist). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Read events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /** Subscribe to new events on a specific stream. */
  subscribe(streamId: string, handler: EventHandler): Subscription;

  /** Subscribe to all new events across all streams. */
  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Current version of a stream, or 0 if it doesn't exist. */
  streamVersion(streamId: string): number;

  /** Current global position, or 0 if the store is empty. */
  globalPosition(): number;

  /** Verify the hash chain over the whole log. */
  verifyIntegrity(): EventStoreIntegrityResult;
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
  /** Global position of the last event that verified */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
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
