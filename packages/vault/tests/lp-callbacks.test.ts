/**
 * Tests for venue callback routing — only the pending request's own
 * callback, in a status that expects it, may run.
 */

import { describe, it, expect } from "vitest";
import type { Market } from "@levyield/sim";
import { ALICE, E18, E6, LP_VAULT, lpFixture, OWNER, settledLpDeposit } from "./fixtures.js";

const ONE_DAY = 86_400;

function refreshPrices(market: Market): void {
  market.oracle.setPrice("weth", 2_000n * 10n ** 8n);
  market.oracle.setPrice("usdc", 10n ** 8n);
}

describe("LpVault callbacks", () => {
  it("rejects a replayed callback once the request has settled", async () => {
    const { vault, lastEvent } = await settledLpDeposit();

    const outcome = await vault.afterAddLiquidityExecution("venue:1", 3_000n * E18);

    expect(outcome).toEqual({ handled: false, reason: "NO_PENDING_REQUEST" });
    expect(vault.lpAmt).toBe(3_000n * E18);
    expect(vault.totalSupply()).toBe(1_000n * E18);
    expect(vault.status).toBe("Open");
    expect(lastEvent("callback.rejected")?.payload).toEqual({
      reason: "NO_PENDING_REQUEST",
      kind: "add",
      status: "Open",
      pendingKey: null,
    });
  });

  it("rejects a callback whose key is not the pending one", async () => {
    const { market, vault, lastEvent } = lpFixture();
    market.fund(ALICE, "usdc", 1_000n * E6);
    await vault.deposit(ALICE, { token: "usdc", amount: 1_000n * E6, minSharesAmt: 0n, slippage: 100n });

    const outcome = await vault.afterAddLiquidityExecution("venue:99", 3_000n * E18);

    expect(outcome).toEqual({ handled: false, reason: "UNMATCHED_KEY" });
    expect(vault.status).toBe("Deposit");
    expect(vault.pendingRequest()).toEqual({ key: "venue:1", kind: "add" });
    expect(vault.lpAmt).toBe(0n);
    expect(lastEvent("callback.rejected")?.metadata.correlationId).toBe("venue:99");
  });

  it("rejects a callback of the wrong kind for the pending key", async () => {
    const { market, vault } = lpFixture();
    market.fund(ALICE, "usdc", 1_000n * E6);
    await vault.deposit(ALICE, { token: "usdc", amount: 1_000n * E6, minSharesAmt: 0n, slippage: 100n });

    const outcome = await vault.afterRemoveLiquidityExecution("venue:1", E18, E6);

    expect(outcome).toEqual({ handled: false, reason: "UNMATCHED_STATUS" });
    expect(vault.pendingRequest()).toEqual({ key: "venue:1", kind: "add" });
  });

  it("still settles the pending request after rejecting a stray callback", async () => {
    const { market, vault } = lpFixture();
    market.fund(ALICE, "usdc", 1_000n * E6);
    const { key } = await vault.deposit(ALICE, {
      token: "usdc",
      amount: 1_000n * E6,
      minSharesAmt: 0n,
      slippage: 100n,
    });
    await vault.afterAddLiquidityCancellation("venue:99");

    await market.venue.execute(key);

    expect(vault.status).toBe("Open");
    expect(vault.balanceOf(ALICE)).toBe(1_000n * E18);
  });

  it("drops the pending request on a manual status change", async () => {
    const { market, vault, eventTypes } = lpFixture();
    market.fund(ALICE, "usdc", 1_000n * E6);
    const { key } = await vault.deposit(ALICE, {
      token: "usdc",
      amount: 1_000n * E6,
      minSharesAmt: 0n,
      slippage: 100n,
    });

    await vault.emergencyStatusChange(OWNER, "Open");
    const settlement = await market.venue.execute(key);

    expect(vault.pendingRequest()).toBeNull();
    expect(settlement.callback).toEqual({ handled: false, reason: "NO_PENDING_REQUEST" });
    expect(vault.totalSupply()).toBe(0n);
    expect(eventTypes().at(-1)).toBe("callback.rejected");
  });

  describe("replay after a failed continuation", () => {
    it("keeps a deposit pending when a feed goes stale and settles it once refreshed", async () => {
      const { market, vault } = lpFixture();
      market.fund(ALICE, "usdc", 1_000n * E6);
      const { key } = await vault.deposit(ALICE, {
        token: "usdc",
        amount: 1_000n * E6,
        minSharesAmt: 0n,
        slippage: 100n,
      });
      market.clock.advance(ONE_DAY + 1);

      await expect(vault.afterAddLiquidityExecution(key, 3_000n * E18)).rejects.toMatchObject({
        code: "STALE_FEED",
      });
      expect(vault.status).toBe("Deposit");
      expect(vault.pendingRequest()).toEqual({ key, kind: "add" });
      expect(vault.lpAmt).toBe(0n);
      expect(vault.balanceOf(ALICE)).toBe(0n);

      refreshPrices(market);
      const settlement = await market.venue.execute(key);

      expect(settlement.callback).toEqual({ handled: true, route: "processDeposit" });
      expect(vault.status).toBe("Open");
      expect(vault.lpAmt).toBe(3_000n * E18);
      expect(vault.balanceOf(ALICE)).toBe(1_000n * E18);
    });

    it("keeps a withdraw pending when a feed goes stale and completes it on redelivery", async () => {
      const { market, vault } = await settledLpDeposit();
      const { key } = await vault.withdraw(ALICE, {
        token: "usdc",
        shareAmt: 500n * E18,
        minWithdrawAmt: 0n,
        slippage: 100n,
      });
      market.clock.advance(ONE_DAY + 1);

      await expect(market.venue.execute(key)).rejects.toMatchObject({ code: "STALE_FEED" });
      expect(vault.status).toBe("Withdraw");
      expect(vault.pendingRequest()).toEqual({ key, kind: "remove" });
      expect(vault.lpAmt).toBe(3_000n * E18);
      expect(market.wethPool.debtOf(LP_VAULT)).toBe(75n * 10n ** 16n);

      refreshPrices(market);
      const outcome = await vault.afterRemoveLiquidityExecution(key, 375n * 10n ** 15n, 750n * E6);

      expect(outcome).toEqual({ handled: true, route: "processWithdraw" });
      expect(vault.status).toBe("Open");
      expect(vault.lpAmt).toBe(1_500n * E18);
      expect(vault.totalSupply()).toBe(500n * E18);
      expect(await market.bank.balanceOf("usdc", ALICE)).toBe(500n * E6);
    });
  });
});
