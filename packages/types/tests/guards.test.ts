/**
 * Runtime type guard tests for @levyield/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isVaultStatus,
  isDelta,
  isRebalanceType,
  isTokenRef,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import { VAULT_STATUSES } from "../src/vault.js";

// =============================================================================
// Vault guards
// =============================================================================

describe("isVaultStatus", () => {
  it("accepts every lifecycle status", () => {
    for (const status of VAULT_STATUSES) {
      expect(isVaultStatus(status)).toBe(true);
    }
  });

  it("is case-sensitive", () => {
    expect(isVaultStatus("open")).toBe(false);
    expect(isVaultStatus("DEPOSIT_FAILED")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isVaultStatus(0)).toBe(false);
    expect(isVaultStatus(null)).toBe(false);
  });
});

describe("isDelta / isRebalanceType", () => {
  it("accepts strategy tags", () => {
    expect(isDelta("Neutral")).toBe(true);
    expect(isDelta("Long")).toBe(true);
    expect(isDelta("Short")).toBe(true);
    expect(isDelta("neutral")).toBe(false);
  });

  it("accepts rebalance types", () => {
    expect(isRebalanceType("Delta")).toBe(true);
    expect(isRebalanceType("Debt")).toBe(true);
    expect(isRebalanceType("Leverage")).toBe(false);
  });
});

// =============================================================================
// Chain guards
// =============================================================================

describe("isTokenRef", () => {
  it("accepts a valid token", () => {
    expect(isTokenRef({ address: "0xUSDC", symbol: "USDC", decimals: 6 })).toBe(true);
  });

  it("rejects empty address", () => {
    expect(isTokenRef({ address: "", symbol: "USDC", decimals: 6 })).toBe(false);
  });

  it("rejects decimals above 18", () => {
    expect(isTokenRef({ address: "0xT", symbol: "T", decimals: 19 })).toBe(false);
  });

  it("rejects fractional decimals", () => {
    expect(isTokenRef({ address: "0xT", symbol: "T", decimals: 6.5 })).toBe(false);
  });

  it("rejects null", () => {
    expect(isTokenRef(null)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const metadata = {
  eventId: "evt-1",
  timestamp: "2025-01-01T00:00:00Z",
  actor: "keeper-1",
  correlationId: "req-1",
  source: "vault",
};

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("rejects unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "treasury" })).toBe(false);
  });

  it("rejects missing correlationId", () => {
    const { correlationId: _omit, ...rest } = metadata;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({ type: "deposit.requested", metadata, payload: { amt: "1" } }),
    ).toBe(true);
  });

  it("rejects null payload", () => {
    expect(isDomainEvent({ type: "deposit.requested", metadata, payload: null })).toBe(false);
  });

  it("rejects invalid metadata", () => {
    expect(
      isDomainEvent({ type: "x", metadata: { eventId: 1 }, payload: {} }),
    ).toBe(false);
  });
});
