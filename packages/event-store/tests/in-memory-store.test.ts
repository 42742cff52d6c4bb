/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, per-stream versions, global position
 * - Concurrency: expected version, no_stream, any
 * - Read / ReadAll: from version or position, max count
 * - Subscriptions: stream-specific, global, unsubscribe
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@levyield/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

let seq = 0;

function makeEvent(type: string, correlationId = "corr-1"): DomainEvent {
  seq += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${seq}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "keeper-1",
      correlationId,
      source: "vault",
    },
    payload: { amount: "1000" },
  };
}

function makeEvents(count: number, prefix = "deposit"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();

    const result = store.append("vault-1", [makeEvent("deposit.requested")]);

    expect(result).toEqual({ streamId: "vault-1", fromVersion: 1, toVersion: 1, count: 1 });
  });

  it("assigns contiguous versions within a stream", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(2));
    store.append("vault-1", makeEvents(3));

    expect(store.read("vault-1").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
    expect(store.streamVersion("vault-1")).toBe(5);
  });

  it("keeps independent versions per stream and a shared global position", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(2));
    store.append("vault-2", makeEvents(1));

    expect(store.read("vault-2")[0]?.version).toBe(1);
    expect(store.read("vault-2")[0]?.globalPosition).toBe(3);
    expect(store.globalPosition()).toBe(3);
  });

  it("stores the domain event unchanged", () => {
    const store = new InMemoryEventStore();
    const event = makeEvent("withdraw.completed", "key-7");
    store.append("vault-1", [event]);

    expect(store.read("vault-1")[0]?.event).toEqual(event);
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("vault-1", [])).toThrow(EventStoreError);
  });

  it("rejects an empty stream ID", () => {
    const store = new InMemoryEventStore();
    try {
      store.append("", [makeEvent("x")]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      if (err instanceof EventStoreError) {
        expect(err.code).toBe("INVALID_STREAM_ID");
      }
    }
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("concurrency control", () => {
  it("accepts the current version", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(2));

    const result = store.append("vault-1", makeEvents(1), { expectedVersion: 2 });
    expect(result.toVersion).toBe(3);
  });

  it("rejects a stale version with CONCURRENCY_CONFLICT", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(2));

    try {
      store.append("vault-1", makeEvents(1), { expectedVersion: 1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      if (err instanceof EventStoreError) {
        expect(err.code).toBe("CONCURRENCY_CONFLICT");
        expect(err.streamId).toBe("vault-1");
      }
    }
  });

  it("no_stream succeeds only on a new stream", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(1), { expectedVersion: "no_stream" });

    expect(() =>
      store.append("vault-1", makeEvents(1), { expectedVersion: "no_stream" }),
    ).toThrow(EventStoreError);
  });

  it("any skips the check", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(4));

    expect(store.append("vault-1", makeEvents(1), { expectedVersion: "any" }).toVersion).toBe(5);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty array for an unknown stream", () => {
    const store = new InMemoryEventStore();
    expect(store.read("missing")).toEqual([]);
    expect(store.streamVersion("missing")).toBe(0);
  });

  it("reads from a version with a max count", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(5));

    const events = store.read("vault-1", { fromVersion: 2, maxCount: 2 });
    expect(events.map((e) => e.version)).toEqual([2, 3]);
  });

  it("rejects fromVersion below 1", () => {
    const store = new InMemoryEventStore();
    expect(() => store.read("vault-1", { fromVersion: 0 })).toThrow(EventStoreError);
  });

  it("readAll interleaves streams in append order", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", [makeEvent("a")]);
    store.append("vault-2", [makeEvent("b")]);
    store.append("vault-1", [makeEvent("c")]);

    expect(store.readAll().map((e) => e.event.type)).toEqual(["a", "b", "c"]);
    expect(store.readAll({ fromPosition: 2, maxCount: 1 }).map((e) => e.event.type)).toEqual(["b"]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("stream subscribers see only their stream", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribe("vault-1", handler);

    store.append("vault-1", makeEvents(2));
    store.append("vault-2", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("global subscribers see every stream", () => {
    const store = new InMemoryEventStore();
    const seen: string[] = [];
    store.subscribeAll((e) => seen.push(e.streamId));

    store.append("vault-1", makeEvents(1));
    store.append("vault-2", makeEvents(1));

    expect(seen).toEqual(["vault-1", "vault-2"]);
  });

  it("unsubscribe stops delivery", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    const sub = store.subscribe("vault-1", handler);
    const globalHandler = vi.fn();
    const globalSub = store.subscribeAll(globalHandler);

    store.append("vault-1", makeEvents(1));
    sub.unsubscribe();
    globalSub.unsubscribe();
    store.append("vault-1", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(globalHandler).toHaveBeenCalledTimes(1);
  });

  it("subscribers receive the stored event after it is readable", () => {
    const store = new InMemoryEventStore();
    let readable = 0;
    store.subscribeAll(() => {
      readable = store.globalPosition();
    });

    store.append("vault-1", makeEvents(3));
    expect(readable).toBe(3);
  });
});
