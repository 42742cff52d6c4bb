/**
 * Tests for the LP deposit saga — request, settlement, cancellation and
 * failure recovery.
 */

import { describe, it, expect } from "vitest";
import { NATIVE_TOKEN } from "@levyield/types";
import { VaultError } from "../src/errors.js";
import {
  ALICE,
  BOB,
  E18,
  E6,
  KEEPER,
  LP_VAULT,
  lpFixture,
  settledLpDeposit,
} from "./fixtures.js";

// =============================================================================
// Helpers
// =============================================================================

const USDC = "usdc";
const WETH = "weth";

function usdcDeposit(amount: bigint, overrides: { minSharesAmt?: bigint; slippage?: bigint } = {}) {
  return {
    token: USDC,
    amount,
    minSharesAmt: overrides.minSharesAmt ?? 0n,
    slippage: overrides.slippage ?? 100n,
  };
}

// =============================================================================
// Tests
// =============================================================================

describe("LpVault deposit", () => {
  describe("request", () => {
    it("borrows both legs, escrows them with the venue and waits", async () => {
      const { market, vault, eventTypes } = lpFixture();
      market.fund(ALICE, USDC, 1_000n * E6);

      const result = await vault.deposit(ALICE, usdcDeposit(1_000n * E6));

      expect(result).toEqual({
        key: "venue:1",
        depositValue: 1_000n * E18,
        borrowed: { tokenA: 750n * 10n ** 15n, tokenB: 500n * E6 },
        minSharesAmt: 990n * E18,
      });
      expect(vault.status).toBe("Deposit");
      expect(vault.pendingRequest()).toEqual({ key: "venue:1", kind: "add" });
      expect(market.wethPool.debtOf(LP_VAULT)).toBe(750n * 10n ** 15n);
      expect(market.usdcPool.debtOf(LP_VAULT)).toBe(500n * E6);
      expect(market.venue.pendingRequests()).toHaveLength(1);
      expect(vault.totalSupply()).toBe(0n);
      expect(eventTypes()).toEqual(["status.changed", "deposit.requested"]);
    });

    it("asks the venue for at least the fair LP amount less slippage", async () => {
      const { market, vault } = lpFixture();
      market.fund(ALICE, USDC, 1_000n * E6);

      await vault.deposit(ALICE, usdcDeposit(1_000n * E6));

      const [pending] = market.venue.pendingRequests();
      expect(pending?.kind).toBe("add");
      if (pending?.kind !== "add") return;
      expect(pending.request).toEqual({
        owner: LP_VAULT,
        tokenAAmt: 750n * 10n ** 15n,
        tokenBAmt: 1_500n * E6,
        minLpOut: 2_970n * E18,
      });
    });

    it("rejects a second deposit while one is in flight", async () => {
      const { market, vault } = lpFixture();
      market.fund(ALICE, USDC, 2_000n * E6);
      await vault.deposit(ALICE, usdcDeposit(1_000n * E6));

      await expect(vault.deposit(ALICE, usdcDeposit(1_000n * E6))).rejects.toMatchObject({
        code: "INVALID_STATUS",
      });
    });

    it.each([
      ["EMPTY_DEPOSIT_AMOUNT", usdcDeposit(0n)],
      ["SLIPPAGE_BELOW_MINIMUM", usdcDeposit(1_000n * E6, { slippage: 49n })],
      ["INSUFFICIENT_DEPOSIT_VALUE", usdcDeposit(9n * E6)],
      ["EXCESSIVE_DEPOSIT_VALUE", usdcDeposit(1_000_001n * E6)],
    ] as const)("throws %s before touching any balance", async (code, params) => {
      const { market, vault } = lpFixture();
      market.fund(ALICE, USDC, 2_000_000n * E6);

      await expect(vault.deposit(ALICE, params)).rejects.toMatchObject({ code });
      expect(await market.bank.balanceOf(USDC, ALICE)).toBe(2_000_000n * E6);
      expect(vault.status).toBe("Open");
    });

    it("throws INSUFFICIENT_CAPACITY when the lending pools cannot lever the deposit", async () => {
      // 1 WETH left to lend caps new equity at ~1,333 USD
      const { market, vault } = lpFixture();
      await market.wethPool.borrow("whale", 999n * E18);
      market.fund(ALICE, USDC, 2_000n * E6);

      await expect(vault.deposit(ALICE, usdcDeposit(2_000n * E6))).rejects.toMatchObject({
        code: "INSUFFICIENT_CAPACITY",
      });
    });

    it("throws INVALID_DEPOSIT_TOKEN for a token the vault does not take", async () => {
      const { vault } = lpFixture();

      const err = await vault.deposit(ALICE, { ...usdcDeposit(E18), token: "rseth" }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(VaultError);
      expect(err).toMatchObject({ code: "INVALID_DEPOSIT_TOKEN", details: { token: "rseth" } });
    });
  });

  describe("settlement", () => {
    it("mints one share per unit of value into an empty vault", async () => {
      const { vault } = await settledLpDeposit();

      expect(vault.status).toBe("Open");
      expect(vault.pendingRequest()).toBeNull();
      expect(vault.lpAmt).toBe(3_000n * E18);
      expect(vault.balanceOf(ALICE)).toBe(1_000n * E18);
      expect(vault.totalSupply()).toBe(1_000n * E18);
    });

    it("leaves the position at target leverage and delta neutral", async () => {
      const { vault } = await settledLpDeposit();

      const metrics = await vault.metrics();
      expect(metrics.assetValue).toBe(3_000n * E18);
      expect(metrics.debtValue).toBe(2_000n * E18);
      expect(metrics.equityValue).toBe(1_000n * E18);
      expect(metrics.leverage).toBe(3n * E18);
      expect(metrics.debtRatio).toBe(666_666_666_666_666_666n);
      expect(metrics.delta).toBe(0n);
      expect(metrics.svTokenValue).toBe(E18);
    });

    it("prices a second deposit at the current share value", async () => {
      const { market, vault } = await settledLpDeposit();
      market.fund(BOB, USDC, 1_000n * E6);

      const { key } = await vault.deposit(BOB, usdcDeposit(1_000n * E6));
      await market.venue.execute(key);

      expect(vault.balanceOf(BOB)).toBe(1_000n * E18);
      expect(vault.lpAmt).toBe(6_000n * E18);
      expect(await vault.equityValue()).toBe(2_000n * E18);
    });

    it("wraps a native deposit and prices it as the wrapped token", async () => {
      const { market, vault } = lpFixture();
      market.fund(ALICE, NATIVE_TOKEN, 5n * 10n ** 17n);

      const result = await vault.depositNative(ALICE, { amount: 5n * 10n ** 17n, minSharesAmt: 0n, slippage: 100n });
      await market.venue.execute(result.key);

      expect(result.depositValue).toBe(1_000n * E18);
      expect(await market.bank.balanceOf(NATIVE_TOKEN, ALICE)).toBe(0n);
      expect(vault.balanceOf(ALICE)).toBe(1_000n * E18);
      expect(vault.lpAmt).toBe(3_000n * E18);
    });

    it("swaps an extra deposit token into tokenB before adding", async () => {
      const { market, vault } = lpFixture();
      market.fund(ALICE, "arb", 2_000n * E18);

      const result = await vault.deposit(ALICE, { token: "arb", amount: 2_000n * E18, minSharesAmt: 0n, slippage: 100n });

      const [pending] = market.venue.pendingRequests();
      expect(result.depositValue).toBe(1_000n * E18);
      expect(pending?.kind === "add" ? pending.request.tokenBAmt : 0n).toBe(1_500n * E6);
    });
  });

  describe("cancellation", () => {
    it("repays the borrow and returns the exact deposit", async () => {
      const { market, vault, eventTypes } = lpFixture();
      market.fund(ALICE, USDC, 1_000n * E6);
      const { key } = await vault.deposit(ALICE, usdcDeposit(1_000n * E6));

      const settlement = await market.venue.cancel(key);

      expect(settlement.callback).toEqual({ handled: true, route: "processDepositCancellation" });
      expect(await market.bank.balanceOf(USDC, ALICE)).toBe(1_000n * E6);
      expect(market.wethPool.debtOf(LP_VAULT)).toBe(0n);
      expect(market.usdcPool.debtOf(LP_VAULT)).toBe(0n);
      expect(await market.bank.balanceOf(USDC, LP_VAULT)).toBe(0n);
      expect(await market.bank.balanceOf(WETH, LP_VAULT)).toBe(0n);
      expect(vault.status).toBe("Open");
      expect(vault.totalSupply()).toBe(0n);
      expect(eventTypes()).toContain("deposit.cancelled");
    });

    it("returns a native deposit as native", async () => {
      const { market, vault } = lpFixture();
      market.fund(ALICE, NATIVE_TOKEN, 5n * 10n ** 17n);
      const { key } = await vault.depositNative(ALICE, { amount: 5n * 10n ** 17n, minSharesAmt: 0n, slippage: 100n });

      await market.venue.cancel(key);

      expect(await market.bank.balanceOf(NATIVE_TOKEN, ALICE)).toBe(5n * 10n ** 17n);
      expect(await market.bank.balanceOf(WETH, ALICE)).toBe(0n);
    });

    it("auto-cancels when the settled LP falls below the user's slippage", async () => {
      const { market, vault } = lpFixture();
      market.fund(ALICE, USDC, 1_000n * E6);
      const { key } = await vault.deposit(ALICE, usdcDeposit(1_000n * E6));

      const settlement = await market.venue.execute(key, { haircutBps: 150n });

      expect(settlement.status).toBe("cancelled");
      expect(await market.bank.balanceOf(USDC, ALICE)).toBe(1_000n * E6);
      expect(vault.status).toBe("Open");
    });
  });

  describe("failure", () => {
    it("parks in Deposit_Failed when the debt ratio steps too far", async () => {
      const { market, vault, lastEvent } = await settledLpDeposit({ debtRatioStepThreshold: 10n });
      market.fund(BOB, USDC, 1_000n * E6);
      const { key } = await vault.deposit(BOB, usdcDeposit(1_000n * E6));

      await market.venue.execute(key, { haircutBps: 50n });

      expect(vault.status).toBe("Deposit_Failed");
      expect(vault.balanceOf(BOB)).toBe(0n);
      expect(lastEvent("deposit.failed")?.payload).toMatchObject({
        code: "EXCEEDS_STEP_CHANGE",
        lpReceived: "2985000000000000000000",
      });
    });

    it("parks in Deposit_Failed when fewer shares than the minimum would be minted", async () => {
      const { market, vault, lastEvent } = await settledLpDeposit();
      market.fund(BOB, USDC, 1_000n * E6);
      const { key } = await vault.deposit(BOB, usdcDeposit(1_000n * E6, { minSharesAmt: 1_001n * E18 }));

      await market.venue.execute(key);

      expect(vault.status).toBe("Deposit_Failed");
      expect(vault.lpAmt).toBe(6_000n * E18);
      expect(lastEvent("deposit.failed")?.payload).toMatchObject({ code: "INSUFFICIENT_SHARES_MINTED" });
    });

    it("blocks user operations until the failure is processed", async () => {
      const { market, vault } = await settledLpDeposit();
      market.fund(BOB, USDC, 1_000n * E6);
      const { key } = await vault.deposit(BOB, usdcDeposit(1_000n * E6, { minSharesAmt: 1_001n * E18 }));
      await market.venue.execute(key);

      await expect(
        vault.withdraw(ALICE, { token: USDC, shareAmt: E18 * 100n, minWithdrawAmt: 0n, slippage: 100n }),
      ).rejects.toMatchObject({ code: "INVALID_STATUS" });
    });

    it("removes the failed liquidity, repays and refunds the depositor", async () => {
      const { market, vault, eventTypes } = await settledLpDeposit();
      market.fund(BOB, USDC, 1_000n * E6);
      const { key } = await vault.deposit(BOB, usdcDeposit(1_000n * E6, { minSharesAmt: 1_001n * E18 }));
      await market.venue.execute(key);

      const recoveryKey = await vault.processDepositFailure(KEEPER);
      const settlement = await market.venue.execute(recoveryKey);

      expect(recoveryKey).toBe("venue:3");
      expect(settlement.callback).toEqual({ handled: true, route: "processDepositFailureLiquidityWithdrawal" });
      expect(await market.bank.balanceOf(USDC, BOB)).toBe(1_000n * E6);
      expect(vault.status).toBe("Open");
      expect(vault.lpAmt).toBe(3_000n * E18);
      expect(market.wethPool.debtOf(LP_VAULT)).toBe(750n * 10n ** 15n);
      expect(market.usdcPool.debtOf(LP_VAULT)).toBe(500n * E6);
      expect(vault.totalSupply()).toBe(1_000n * E18);
      expect(eventTypes().slice(-3)).toEqual(["deposit.recovery_requested", "deposit.refunded", "status.changed"]);
    });

    it("stays Deposit_Failed when the recovery removal is cancelled, and retries", async () => {
      const { market, vault, eventTypes } = await settledLpDeposit();
      market.fund(BOB, USDC, 1_000n * E6);
      const { key } = await vault.deposit(BOB, usdcDeposit(1_000n * E6, { minSharesAmt: 1_001n * E18 }));
      await market.venue.execute(key);

      const firstKey = await vault.processDepositFailure(KEEPER);
      const cancelled = await market.venue.cancel(firstKey);

      expect(cancelled.callback).toEqual({ handled: true, route: "processDepositFailureCancellation" });
      expect(vault.status).toBe("Deposit_Failed");
      expect(vault.pendingRequest()).toBeNull();
      expect(eventTypes()).toContain("deposit.recovery_cancelled");

      const retryKey = await vault.processDepositFailure(KEEPER);
      await market.venue.execute(retryKey);

      expect(retryKey).toBe("venue:4");
      expect(vault.status).toBe("Open");
      expect(await market.bank.balanceOf(USDC, BOB)).toBe(1_000n * E6);
    });

    it("refuses processDepositFailure outside Deposit_Failed", async () => {
      const { vault } = await settledLpDeposit();

      await expect(vault.processDepositFailure(KEEPER)).rejects.toMatchObject({ code: "INVALID_STATUS" });
    });
  });
});
