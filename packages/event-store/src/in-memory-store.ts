/**
 * @hashlock/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Each ledger engine owns one of these;
 * relayers subscribe to it to learn what happened on that ledger.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch after the append is committed
 * - A throwing handler never fails the append or starves other handlers;
 *   its error is kept in `handlerErrors()` and passed to `onHandlerError`
 * - No durability guarantees (state lives as long as the process)
 */

import type { DomainEvent } from "@hashlock/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Clock for `appendedAt`. Default: wall-clock ISO 8601 */
  readonly now?: () => string;
  /** Told about every error a subscription handler throws. */
  readonly onHandlerError?: (error: unknown, event: StoredEvent) => void;
}

/** An error thrown by a subscription handler during dispatch. */
export interface HandlerFailure {
  readonly error: unknown;
  readonly streamId: string;
  readonly globalPosition: number;
}

/** Most recent handler failures kept by the store. */
export const MAX_HANDLER_FAILURES = 100;

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _now: () => string;
  private readonly _onHandlerError: ((error: unknown, event: StoredEvent) => void) | undefined;
  private readonly _handlerFailures: HandlerFailure[] = [];
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date().toISOString());
    this._onHandlerError = options?.onHandlerError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options);

    const fromVersion = currentVersion + 1;
    const appendedAt = this._now();
    let previousHash = this._lastHash;
    const storedEvents: StoredEvent[] = events.map((event, i) => {
      const base: UnhashedStoredEvent = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      const stored: StoredEvent = { ...base, hash, previousHash };
      previousHash = hash;
      return stored;
    });

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }
    stream.push(...storedEvents);
    this._globalLog.push(...storedEvents);
    this._lastHash = previousHash;

    this._dispatch(streamId, storedEvents);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const direction = options?.direction ?? "forward";
    const fromVersion = options?.fromVersion ?? (direction === "forward" ? 1 : stream.length);

    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      direction === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const direction = options?.direction ?? "forward";
    const fromPosition =
      options?.fromPosition ?? (direction === "forward" ? 1 : this._globalLog.length);

    const result =
      direction === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  /** Recent errors thrown by subscription handlers, oldest first. */
  handlerErrors(): readonly HandlerFailure[] {
    return [...this._handlerFailures];
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    options: AppendOptions | undefined,
  ): void {
    const expected = options?.expectedVersion;
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    // Snapshot the handler sets so a handler may unsubscribe mid-dispatch
    const streamSubs = [...(this._streamSubscribers.get(streamId) ?? [])];
    const globalSubs = [...this._globalSubscribers];

    for (const event of events) {
      for (const handler of streamSubs) {
        this._deliver(handler, event);
      }
      for (const handler of globalSubs) {
        this._deliver(handler, event);
      }
    }
  }

  private _deliver(handler: EventHandler, event: StoredEvent): void {
    try {
      handler(event);
    } catch (error) {
      this._recordFailure(error, event);
      if (this._onHandlerError !== undefined) {
        try {
          this._onHandlerError(error, event);
        } catch (listenerError) {
          this._recordFailure(listenerError, event);
        }
      }
    }
  }

  private _recordFailure(error: unknown, event: StoredEvent): void {
    this._handlerFailures.push({
      error,
      streamId: event.streamId,
      globalPosition: event.globalPosition,
    });
    if (this._handlerFailures.length > MAX_HANDLER_FAILURES) {
      this._handlerFailures.shift();
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
