/**
 * Tests for the event store hash chain.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@levyield/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, StoredEventContent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: "key-1",
      source: "vault",
    },
    payload,
  };
}

function makeContent(payload: Record<string, unknown> = {}): StoredEventContent {
  return {
    event: makeEvent("deposit.requested", payload),
    streamId: "vault-1",
    version: 1,
    globalPosition: 1,
    appendedAt: "2026-01-01T00:00:00.000Z",
  };
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex digest", () => {
    expect(computeEventHash(makeContent(), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic and independent of key order", () => {
    const a = computeEventHash(makeContent({ amount: "1", token: "USDC" }), GENESIS_HASH);
    const b = computeEventHash(makeContent({ token: "USDC", amount: "1" }), GENESIS_HASH);
    expect(a).toBe(b);
  });

  it("changes with the payload", () => {
    const a = computeEventHash(makeContent({ amount: "1" }), GENESIS_HASH);
    const b = computeEventHash(makeContent({ amount: "2" }), GENESIS_HASH);
    expect(a).not.toBe(b);
  });

  it("changes with the previous hash", () => {
    const content = makeContent();
    expect(computeEventHash(content, GENESIS_HASH)).not.toBe(computeEventHash(content, "abc"));
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  function buildStore(): InMemoryEventStore {
    const store = new InMemoryEventStore();
    store.append("vault-1", [makeEvent("deposit.requested", { amount: "1000" })]);
    store.append("vault-2", [makeEvent("withdraw.requested", { shares: "10" })]);
    store.append("vault-1", [makeEvent("deposit.completed", { shares: "1000" })]);
    return store;
  }

  it("links the first event to the genesis hash", () => {
    const store = buildStore();
    const [first, second] = store.readAll();
    expect(first?.previousHash).toBe(GENESIS_HASH);
    expect(second?.previousHash).toBe(first?.hash);
  });

  it("accepts an untouched log", () => {
    const result = buildStore().verifyIntegrity();
    expect(result).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });

  it("accepts an empty log", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("detects an edited payload", () => {
    const events = buildStore().readAll();
    const tampered: StoredEvent[] = events.map((e) =>
      e.globalPosition === 2
        ? { ...e, event: { ...e.event, payload: { shares: "99" } } }
        : e,
    );

    const result = verifyHashChain(tampered);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { position: 2, reason: "Hash mismatch at position 2" },
    ]);
  });

  it("detects a removed event", () => {
    const events = buildStore().readAll().filter((e) => e.globalPosition !== 2);

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { position: 3, reason: "previousHash mismatch at position 3" },
    ]);
  });
});
