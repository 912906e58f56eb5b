/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - Concurrency: expected version, no_stream, any
 * - Read: forward, backward, from version, max count
 * - ReadAll: global ordering, from position, max count
 * - Subscriptions: stream-specific, global, unsubscribe, commit-before-dispatch
 * - Handler failures: isolated from the writer and from other handlers
 * - Query: stream existence, version, global position
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@hashlock/types";
import { InMemoryEventStore, MAX_HANDLER_FAILURES } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import type { StoredEvent } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

let counter = 0;

function makeEvent(type: string, correlationId = "0xhash"): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "0x00000000000000000000000000000000000000aa",
      correlationId,
      source: "swap",
      chainId: "ledger-a",
      height: 100,
    },
    payload: { type },
  };
}

function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

function fixedClock(): () => string {
  return () => "2025-01-01T00:00:00.000Z";
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();

    const result = store.append("swap:1", [makeEvent("swap.initiated")]);

    expect(result).toEqual({ streamId: "swap:1", fromVersion: 1, toVersion: 1, count: 1 });
  });

  it("appends multiple events atomically", () => {
    const store = new InMemoryEventStore();

    const result = store.append("swap:1", makeEvents(3));

    expect(result.fromVersion).toBe(1);
    expect(result.toVersion).toBe(3);
    expect(result.count).toBe(3);
  });

  it("assigns contiguous versions within a stream", () => {
    const store = new InMemoryEventStore();

    store.append("swap:1", makeEvents(2));
    store.append("swap:1", makeEvents(3));

    expect(store.read("swap:1").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns contiguous global positions across streams", () => {
    const store = new InMemoryEventStore();

    store.append("swap:1", makeEvents(2));
    store.append("lock:1", makeEvents(2));
    store.append("swap:1", [makeEvent("late")]);

    expect(store.readAll().map((e) => e.globalPosition)).toEqual([1, 2, 3, 4, 5]);
  });

  it("stores the event with store-level metadata", () => {
    const store = new InMemoryEventStore({ now: fixedClock() });
    const event = makeEvent("swap.initiated");

    store.append("swap:1", [event]);
    const [stored] = store.read("swap:1");

    expect(stored?.event).toEqual(event);
    expect(stored?.streamId).toBe("swap:1");
    expect(stored?.version).toBe(1);
    expect(stored?.globalPosition).toBe(1);
    expect(stored?.appendedAt).toBe("2025-01-01T00:00:00.000Z");
    expect(stored?.previousHash).toBe("genesis");
    expect(stored?.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();

    expect(() => store.append("swap:1", [])).toThrow(EventStoreError);
    expect(() => store.append("swap:1", [])).toThrow("Cannot append zero events");
  });

  it("rejects an empty stream ID", () => {
    const store = new InMemoryEventStore();

    expect(() => store.append("", [makeEvent("x")])).toThrow("non-empty string");
  });

  it("leaves the store unchanged when an append is rejected", () => {
    const store = new InMemoryEventStore();
    store.append("swap:1", makeEvents(1));

    expect(() => store.append("swap:1", makeEvents(2), { expectedVersion: 0 })).toThrow(
      EventStoreError,
    );

    expect(store.globalPosition()).toBe(1);
    expect(store.streamVersion("swap:1")).toBe(1);
  });
});

// =============================================================================
// Concurrency Control
// =============================================================================

describe("concurrency control", () => {
  it("succeeds with the correct expectedVersion", () => {
    const store = new InMemoryEventStore();
    store.append("pool", makeEvents(2));

    const result = store.append("pool", makeEvents(1), { expectedVersion: 2 });

    expect(result.toVersion).toBe(3);
  });

  it("fails with a stale expectedVersion", () => {
    const store = new InMemoryEventStore();
    store.append("pool", makeEvents(2));

    expect(() => store.append("pool", makeEvents(1), { expectedVersion: 1 })).toThrow(
      'Stream "pool" is at version 2, expected 1',
    );
  });

  it("no_stream succeeds on a new stream and fails on an existing one", () => {
    const store = new InMemoryEventStore();

    store.append("gate", makeEvents(1), { expectedVersion: "no_stream" });

    expect(() =>
      store.append("gate", makeEvents(1), { expectedVersion: "no_stream" }),
    ).toThrow(EventStoreError);
  });

  it("'any' skips the check", () => {
    const store = new InMemoryEventStore();
    store.append("gate", makeEvents(4));

    const result = store.append("gate", makeEvents(1), { expectedVersion: "any" });

    expect(result.fromVersion).toBe(5);
  });

  it("conflict error carries the code and stream ID", () => {
    const store = new InMemoryEventStore();
    store.append("gate", makeEvents(1));

    try {
      store.append("gate", makeEvents(1), { expectedVersion: 5 });
      expect.unreachable("append should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      if (err instanceof EventStoreError) {
        expect(err.code).toBe("CONCURRENCY_CONFLICT");
        expect(err.streamId).toBe("gate");
      }
    }
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  function seeded(): InMemoryEventStore {
    const store = new InMemoryEventStore();
    store.append("swap:1", makeEvents(5, "step"));
    return store;
  }

  it("reads a stream forward", () => {
    expect(seeded().read("swap:1").map((e) => e.event.type)).toEqual([
      "step.1",
      "step.2",
      "step.3",
      "step.4",
      "step.5",
    ]);
  });

  it("returns an empty array for an unknown stream", () => {
    expect(seeded().read("swap:unknown")).toEqual([]);
  });

  it("reads from a version", () => {
    expect(seeded().read("swap:1", { fromVersion: 4 }).map((e) => e.version)).toEqual([4, 5]);
  });

  it("limits with maxCount", () => {
    expect(seeded().read("swap:1", { maxCount: 2 }).map((e) => e.version)).toEqual([1, 2]);
  });

  it("reads backward from the head by default", () => {
    expect(
      seeded().read("swap:1", { direction: "backward", maxCount: 2 }).map((e) => e.version),
    ).toEqual([5, 4]);
  });

  it("reads backward from a version", () => {
    expect(
      seeded().read("swap:1", { direction: "backward", fromVersion: 3 }).map((e) => e.version),
    ).toEqual([3, 2, 1]);
  });

  it("rejects fromVersion below 1", () => {
    expect(() => seeded().read("swap:1", { fromVersion: 0 })).toThrow(
      "fromVersion must be >= 1, got 0",
    );
  });
});

// =============================================================================
// ReadAll
// =============================================================================

describe("readAll", () => {
  function seeded(): InMemoryEventStore {
    const store = new InMemoryEventStore();
    store.append("swap:1", [makeEvent("a")]);
    store.append("lock:1", [makeEvent("b")]);
    store.append("swap:1", [makeEvent("c")]);
    return store;
  }

  it("reads every stream in global order", () => {
    expect(seeded().readAll().map((e) => e.event.type)).toEqual(["a", "b", "c"]);
  });

  it("reads from a global position", () => {
    expect(seeded().readAll({ fromPosition: 2 }).map((e) => e.event.type)).toEqual(["b", "c"]);
  });

  it("reads backward", () => {
    expect(seeded().readAll({ direction: "backward" }).map((e) => e.event.type)).toEqual([
      "c",
      "b",
      "a",
    ]);
  });

  it("limits with maxCount", () => {
    expect(seeded().readAll({ maxCount: 1 }).map((e) => e.event.type)).toEqual(["a"]);
  });

  it("returns an empty array for an empty store", () => {
    expect(new InMemoryEventStore().readAll()).toEqual([]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("stream subscription receives only that stream's events", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribe("swap:1", handler);

    store.append("swap:1", [makeEvent("mine")]);
    store.append("swap:2", [makeEvent("other")]);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]?.event.type).toBe("mine");
  });

  it("global subscription receives events from every stream", () => {
    const store = new InMemoryEventStore();
    const seen: string[] = [];
    store.subscribeAll((e) => seen.push(e.streamId));

    store.append("swap:1", [makeEvent("a")]);
    store.append("gate", [makeEvent("b")]);

    expect(seen).toEqual(["swap:1", "gate"]);
  });

  it("unsubscribe stops delivery", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    const sub = store.subscribeAll(handler);

    store.append("pool", [makeEvent("a")]);
    sub.unsubscribe();
    store.append("pool", [makeEvent("b")]);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("dispatches a batch in order", () => {
    const store = new InMemoryEventStore();
    const versions: number[] = [];
    store.subscribe("swap:1", (e) => versions.push(e.version));

    store.append("swap:1", makeEvents(3));

    expect(versions).toEqual([1, 2, 3]);
  });

  it("handlers observe the committed append", () => {
    const store = new InMemoryEventStore();
    const positions: number[] = [];
    store.subscribeAll(() => positions.push(store.globalPosition()));

    store.append("pool", makeEvents(2));

    expect(positions).toEqual([2, 2]);
  });

  it("a handler may append to another stream", () => {
    const store = new InMemoryEventStore();
    store.subscribe("swap:1", (e: StoredEvent) => {
      store.append("lock:1", [makeEvent(`reaction-to-${e.event.type}`)]);
    });

    store.append("swap:1", [makeEvent("swap.initiated")]);

    expect(store.read("lock:1").map((e) => e.event.type)).toEqual([
      "reaction-to-swap.initiated",
    ]);
    expect(store.verifyIntegrity().valid).toBe(true);
  });

  it("a handler that unsubscribes mid-batch still sees the batch it was given", () => {
    const store = new InMemoryEventStore();
    const seen: number[] = [];
    const sub = store.subscribeAll((e) => {
      seen.push(e.version);
      sub.unsubscribe();
    });

    store.append("pool", makeEvents(2));
    store.append("pool", makeEvents(1));

    expect(seen).toEqual([1, 2]);
  });
});

// =============================================================================
// Handler Failures
// =============================================================================

describe("handler failures", () => {
  function failing(): never {
    throw new Error("handler failed");
  }

  it("a throwing handler neither fails the append nor hides events from other handlers", () => {
    const store = new InMemoryEventStore();
    const seen: string[] = [];
    store.subscribe("swap:1", failing);
    store.subscribeAll((e) => seen.push(e.event.type));

    const result = store.append("swap:1", [
      makeEvent("swap.completed"),
      makeEvent("swap.secret_revealed"),
    ]);

    expect(result.count).toBe(2);
    expect(seen).toEqual(["swap.completed", "swap.secret_revealed"]);
    expect(store.handlerErrors().map((f) => [f.streamId, f.globalPosition])).toEqual([
      ["swap:1", 1],
      ["swap:1", 2],
    ]);
  });

  it("passes each error and its event to onHandlerError", () => {
    const failure = new Error("bad handler");
    const reported: unknown[] = [];
    const store = new InMemoryEventStore({
      onHandlerError: (error, event) => reported.push(error, event.version),
    });
    store.subscribeAll(() => {
      throw failure;
    });

    store.append("pool", makeEvents(1));

    expect(reported).toEqual([failure, 1]);
  });

  it("records a throwing onHandlerError instead of failing the append", () => {
    const store = new InMemoryEventStore({ onHandlerError: failing });
    store.subscribeAll(failing);

    expect(store.append("pool", makeEvents(1)).count).toBe(1);
    expect(store.handlerErrors()).toHaveLength(2);
  });

  it("keeps only the most recent failures", () => {
    const store = new InMemoryEventStore();
    store.subscribeAll(failing);

    store.append("pool", makeEvents(MAX_HANDLER_FAILURES + 5));

    const failures = store.handlerErrors();
    expect(failures).toHaveLength(MAX_HANDLER_FAILURES);
    expect(failures[0]?.globalPosition).toBe(6);
  });
});

// =============================================================================
// Query
// =============================================================================

describe("query", () => {
  it("streamExists and streamVersion track appends", () => {
    const store = new InMemoryEventStore();

    expect(store.streamExists("lock:1")).toBe(false);
    expect(store.streamVersion("lock:1")).toBe(0);

    store.append("lock:1", makeEvents(2));

    expect(store.streamExists("lock:1")).toBe(true);
    expect(store.streamVersion("lock:1")).toBe(2);
  });

  it("globalPosition counts events across streams", () => {
    const store = new InMemoryEventStore();
    expect(store.globalPosition()).toBe(0);

    store.append("swap:1", makeEvents(2));
    store.append("lock:1", makeEvents(3));

    expect(store.globalPosition()).toBe(5);
  });
});
