/**
 * Tests for event store hash chain — tamper-evident event log.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@hashlock/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, UnhashedStoredEvent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "0x00000000000000000000000000000000000000aa",
      correlationId: "corr",
      source: "lock",
      chainId: "ledger-b",
      height: 7,
    },
    payload,
  };
}

function unhashed(payload: Record<string, unknown> = {}): UnhashedStoredEvent {
  return {
    event: makeEvent("lock.created", payload),
    streamId: "lock:1",
    version: 1,
    globalPosition: 1,
    appendedAt: "2025-01-01T00:00:00.000Z",
  };
}

function seededStore(count: number): InMemoryEventStore {
  const store = new InMemoryEventStore({ now: () => "2025-01-01T00:00:00.000Z" });
  for (let i = 0; i < count; i++) {
    store.append(`swap:${i % 2}`, [makeEvent("swap.initiated", { index: i })]);
  }
  return store;
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(unhashed(), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic", () => {
    expect(computeEventHash(unhashed({ amount: "5" }), GENESIS_HASH)).toBe(
      computeEventHash(unhashed({ amount: "5" }), GENESIS_HASH),
    );
  });

  it("ignores payload key order", () => {
    expect(computeEventHash(unhashed({ a: "1", b: "2" }), GENESIS_HASH)).toBe(
      computeEventHash(unhashed({ b: "2", a: "1" }), GENESIS_HASH),
    );
  });

  it("changes when the payload changes", () => {
    expect(computeEventHash(unhashed({ amount: "5" }), GENESIS_HASH)).not.toBe(
      computeEventHash(unhashed({ amount: "6" }), GENESIS_HASH),
    );
  });

  it("changes when previousHash changes", () => {
    expect(computeEventHash(unhashed(), GENESIS_HASH)).not.toBe(
      computeEventHash(unhashed(), "f".repeat(64)),
    );
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an empty log", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("accepts a correctly chained log", () => {
    const result = verifyHashChain(seededStore(4).readAll());

    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(4);
  });

  it("detects tampered event content", () => {
    const events = [...seededStore(3).readAll()];
    const second = events[1];
    if (second === undefined) throw new Error("expected 3 events");
    events[1] = { ...second, event: { ...second.event, payload: { index: 99 } } };

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors[0]?.position).toBe(2);
    expect(result.errors[0]?.reason).toContain("Hash mismatch at position 2");
  });

  it("detects a broken link", () => {
    const events = [...seededStore(3).readAll()];
    const third = events[2];
    if (third === undefined) throw new Error("expected 3 events");
    const relinked: StoredEvent = { ...third, previousHash: GENESIS_HASH };
    events[2] = relinked;

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toContain(3);
    expect(result.errors[0]?.reason).toContain("previousHash mismatch at position 3");
  });
});

// =============================================================================
// InMemoryEventStore chaining
// =============================================================================

describe("InMemoryEventStore hash chain", () => {
  it("links the first event to genesis and each later event to its predecessor", () => {
    const [first, second, third] = seededStore(3).readAll();

    expect(first?.previousHash).toBe(GENESIS_HASH);
    expect(second?.previousHash).toBe(first?.hash);
    expect(third?.previousHash).toBe(second?.hash);
  });

  it("chains across streams and separate appends", () => {
    const store = seededStore(2);
    store.append("gate", [makeEvent("gate.paused"), makeEvent("gate.unpaused")]);

    const all = store.readAll();
    expect(all[2]?.previousHash).toBe(all[1]?.hash);
    expect(all[3]?.previousHash).toBe(all[2]?.hash);
    expect(store.verifyIntegrity().valid).toBe(true);
  });

  it("does not advance the chain when an append is rejected", () => {
    const store = seededStore(1);
    expect(() => store.append("swap:0", [makeEvent("x")], { expectedVersion: 9 })).toThrow();

    store.append("swap:0", [makeEvent("y")]);

    expect(store.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 2, errors: [] });
  });
});
