/**
 * Tests for derived accounting at its edges: an underwater position,
 * feed failures reaching the caller, and the Neutral capacity bound.
 */

import { describe, it, expect } from "vitest";
import type { Market } from "@levyield/sim";
import {
  ALICE,
  E18,
  E6,
  LP_VAULT,
  lpFixture,
  LRT_VAULT,
  lrtFixture,
  settledLpDeposit,
  settledLrtDeposit,
} from "./fixtures.js";

// =============================================================================
// Helpers
// =============================================================================

type FeedFailure = readonly [code: string, breakFeed: (market: Market, token: string) => void];

const FEED_FAILURES: readonly FeedFailure[] = [
  ["NO_PRICE_FEED", (market, token) => market.oracle.removeFeed(token)],
  ["BROKEN_FEED", (market, token) => market.oracle.setPrice(token, 0n)],
  ["STALE_FEED", (market) => market.clock.advance(86_401)],
];

// =============================================================================
// Underwater
// =============================================================================

describe("underwater position", () => {
  it("floors LP equity at zero and reports zero leverage and delta", async () => {
    const { market, vault } = await settledLpDeposit();
    market.wethPool.accrueInterest(LP_VAULT, 10n * E18);

    const metrics = await vault.metrics();

    expect(metrics.assetValue).toBe(3_000n * E18);
    expect(metrics.debtValue).toBe(22_000n * E18);
    expect(metrics.equityValue).toBe(0n);
    expect(metrics.leverage).toBe(0n);
    expect(metrics.delta).toBe(0n);
    expect(metrics.debtRatio).toBe(7_333_333_333_333_333_333n);
  });

  it("floors LRT equity at zero and reports zero leverage and delta", async () => {
    const { market, vault } = await settledLrtDeposit();
    market.wethPool.accrueInterest(LRT_VAULT, 10n * E18);

    const metrics = await vault.metrics();

    expect(metrics.assetValue).toBe(6_000n * E18);
    expect(metrics.debtValue).toBe(24_000n * E18);
    expect(metrics.equityValue).toBe(0n);
    expect(metrics.leverage).toBe(0n);
    expect(metrics.delta).toBe(0n);
    expect(metrics.debtRatio).toBe(4n * E18);
  });
});

// =============================================================================
// Feed failures
// =============================================================================

describe("feed failures", () => {
  describe.each(FEED_FAILURES)("%s", (code, breakFeed) => {
    it("rejects an LP deposit before any funds move", async () => {
      const { market, vault } = lpFixture();
      market.fund(ALICE, "usdc", 1_000n * E6);
      breakFeed(market, "weth");

      await expect(
        vault.deposit(ALICE, { token: "usdc", amount: 1_000n * E6, minSharesAmt: 0n, slippage: 100n }),
      ).rejects.toMatchObject({ code });
      expect(vault.status).toBe("Open");
      expect(vault.pendingRequest()).toBeNull();
      expect(await market.bank.balanceOf("usdc", ALICE)).toBe(1_000n * E6);
    });

    it("rejects an LP withdraw with the shares still with the holder", async () => {
      const { market, vault } = await settledLpDeposit();
      breakFeed(market, "usdc");

      await expect(
        vault.withdraw(ALICE, { token: "usdc", shareAmt: 500n * E18, minWithdrawAmt: 0n, slippage: 100n }),
      ).rejects.toMatchObject({ code });
      expect(vault.status).toBe("Open");
      expect(vault.balanceOf(ALICE)).toBe(1_000n * E18);
      expect(vault.lpAmt).toBe(3_000n * E18);
    });

    it("rejects an LRT deposit before any funds move", async () => {
      const { market, vault } = lrtFixture();
      market.fund(ALICE, "weth", E18);
      breakFeed(market, "weth");

      await expect(
        vault.deposit(ALICE, { token: "weth", amount: E18, minSharesAmt: 0n, slippage: 100n }),
      ).rejects.toMatchObject({ code });
      expect(vault.totalSupply()).toBe(0n);
      expect(await market.bank.balanceOf("weth", ALICE)).toBe(E18);
    });

    it("rejects an LRT withdraw with the position intact", async () => {
      const { market, vault } = await settledLrtDeposit();
      breakFeed(market, "rseth");

      await expect(
        vault.withdraw(ALICE, { shareAmt: 1_000n * E18, minWithdrawAmt: 0n, slippage: 100n }),
      ).rejects.toMatchObject({ code });
      expect(vault.balanceOf(ALICE)).toBe(2_000n * E18);
      expect(vault.lrtAmt).toBe(24n * 10n ** 17n);
      expect(market.wethPool.debtOf(LRT_VAULT)).toBe(2n * E18);
    });
  });
});

// =============================================================================
// Neutral capacity
// =============================================================================

describe("Neutral additional capacity", () => {
  it("is bound by tokenA alone when leverage × weightB is exactly one", async () => {
    const { vault } = lpFixture({ leverage: 2n * E18 });

    const metrics = await vault.metrics();

    // 1,000 WETH available at $2,000, one unit of tokenA borrow per unit of equity
    expect(metrics.additionalCapacity).toBe(2_000_000n * E18);
  });

  it("throws UNDERFLOW when leverage × weightB is below one", async () => {
    const { market, vault } = lpFixture({ leverage: 15n * 10n ** 17n });
    market.fund(ALICE, "usdc", 1_000n * E6);

    await expect(vault.metrics()).rejects.toMatchObject({ code: "UNDERFLOW" });
    await expect(
      vault.deposit(ALICE, { token: "usdc", amount: 1_000n * E6, minSharesAmt: 0n, slippage: 100n }),
    ).rejects.toMatchObject({ code: "UNDERFLOW" });
    expect(await market.bank.balanceOf("usdc", ALICE)).toBe(1_000n * E6);
  });
});
