/**
 * Tests for LrtVault — every operation settles within the call, and a
 * failed after-check is unwound before the error reaches the caller.
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
  LRT_VAULT,
  lrtFixture,
  OWNER,
  settledLrtDeposit,
  TREASURY,
} from "./fixtures.js";

// =============================================================================
// Helpers
// =============================================================================

const WETH = "weth";
const RSETH = "rseth";

function halfWithdraw(overrides: { minWithdrawAmt?: bigint; unwrap?: boolean } = {}) {
  return {
    shareAmt: 1_000n * E18,
    minWithdrawAmt: overrides.minWithdrawAmt ?? 0n,
    slippage: 100n,
    ...(overrides.unwrap !== undefined ? { unwrap: overrides.unwrap } : {}),
  };
}

// =============================================================================
// Tests
// =============================================================================

describe("LrtVault", () => {
  describe("deposit", () => {
    it("borrows, buys the LRT and mints shares in one call", async () => {
      const { market, vault, eventTypes } = lrtFixture();
      market.fund(ALICE, WETH, E18);

      const result = await vault.deposit(ALICE, { token: WETH, amount: E18, minSharesAmt: 0n, slippage: 100n });

      expect(result).toEqual({
        shares: 2_000n * E18,
        depositValue: 2_000n * E18,
        borrowed: 2n * E18,
        lrtBought: 24n * 10n ** 17n,
      });
      expect(vault.status).toBe("Open");
      expect(vault.lrtAmt).toBe(24n * 10n ** 17n);
      expect(market.wethPool.debtOf(LRT_VAULT)).toBe(2n * E18);
      expect(eventTypes()).toEqual(["deposit.completed"]);
    });

    it("reports a Long position at target leverage", async () => {
      const { vault } = await settledLrtDeposit();

      const metrics = await vault.metrics();
      expect(metrics.assetValue).toBe(6_000n * E18);
      expect(metrics.debtValue).toBe(4_000n * E18);
      expect(metrics.equityValue).toBe(2_000n * E18);
      expect(metrics.leverage).toBe(3n * E18);
      expect(metrics.debtRatio).toBe(666_666_666_666_666_666n);
      expect(metrics.delta).toBe(E18);
      expect(metrics.positionAmt).toBe(24n * 10n ** 17n);
    });

    it("takes the LRT itself and borrows only for the leverage", async () => {
      const { market, vault } = lrtFixture();
      market.fund(ALICE, RSETH, 4n * 10n ** 17n);

      const result = await vault.deposit(ALICE, {
        token: RSETH,
        amount: 4n * 10n ** 17n,
        minSharesAmt: 0n,
        slippage: 100n,
      });

      expect(result.borrowed).toBe(E18);
      expect(result.lrtBought).toBe(8n * 10n ** 17n);
      expect(vault.lrtAmt).toBe(12n * 10n ** 17n);
      expect(result.shares).toBe(1_000n * E18);
    });

    it("swaps an extra deposit token into the borrow token first", async () => {
      const { market, vault } = lrtFixture();
      market.fund(ALICE, "usdc", 2_000n * E6);

      const result = await vault.deposit(ALICE, {
        token: "usdc",
        amount: 2_000n * E6,
        minSharesAmt: 0n,
        slippage: 100n,
      });

      expect(result.lrtBought).toBe(24n * 10n ** 17n);
      expect(result.shares).toBe(2_000n * E18);
    });

    it("wraps a native deposit", async () => {
      const { market, vault } = lrtFixture();
      market.fund(ALICE, NATIVE_TOKEN, E18);

      const result = await vault.depositNative(ALICE, { amount: E18, minSharesAmt: 0n, slippage: 100n });

      expect(result.shares).toBe(2_000n * E18);
      expect(await market.bank.balanceOf(NATIVE_TOKEN, ALICE)).toBe(0n);
    });

    it("unwinds and refunds when fewer shares than the minimum would be minted", async () => {
      const { market, vault, lastEvent } = lrtFixture();
      market.fund(ALICE, WETH, E18);

      const err = await vault
        .deposit(ALICE, { token: WETH, amount: E18, minSharesAmt: 2_001n * E18, slippage: 100n })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(VaultError);
      expect(err).toMatchObject({ code: "INSUFFICIENT_SHARES_MINTED" });
      expect(await market.bank.balanceOf(WETH, ALICE)).toBe(E18);
      expect(market.wethPool.debtOf(LRT_VAULT)).toBe(0n);
      expect(vault.lrtAmt).toBe(0n);
      expect(vault.totalSupply()).toBe(0n);
      expect(vault.status).toBe("Open");
      expect(lastEvent("deposit.failed")?.payload).toMatchObject({ refunded: "1000000000000000000" });
    });
  });

  describe("withdraw", () => {
    it("sells the share of LRT, repays the share of debt and pays the rest", async () => {
      const { market, vault } = await settledLrtDeposit();

      const result = await vault.withdraw(ALICE, halfWithdraw());

      expect(result).toEqual({ assetsOut: 5n * 10n ** 17n, repaid: E18, lrtSold: 12n * 10n ** 17n });
      expect(await market.bank.balanceOf(WETH, ALICE)).toBe(5n * 10n ** 17n);
      expect(market.wethPool.debtOf(LRT_VAULT)).toBe(E18);
      expect(vault.lrtAmt).toBe(12n * 10n ** 17n);
      expect(vault.totalSupply()).toBe(1_000n * E18);
      expect(await vault.equityValue()).toBe(1_000n * E18);
    });

    it("pays native on request", async () => {
      const { market, vault } = await settledLrtDeposit();

      await vault.withdraw(ALICE, halfWithdraw({ unwrap: true }));

      expect(await market.bank.balanceOf(NATIVE_TOKEN, ALICE)).toBe(5n * 10n ** 17n);
    });

    it("restores the position and the shares when the proceeds are too small", async () => {
      const { market, vault } = await settledLrtDeposit();

      await expect(
        vault.withdraw(ALICE, halfWithdraw({ minWithdrawAmt: 6n * 10n ** 17n })),
      ).rejects.toMatchObject({ code: "INSUFFICIENT_ASSETS_RECEIVED" });

      expect(vault.status).toBe("Open");
      expect(vault.balanceOf(ALICE)).toBe(2_000n * E18);
      expect(vault.balanceOf(LRT_VAULT)).toBe(0n);
      expect(vault.lrtAmt).toBe(24n * 10n ** 17n);
      expect(market.wethPool.debtOf(LRT_VAULT)).toBe(2n * E18);
      expect(await market.bank.balanceOf(WETH, LRT_VAULT)).toBe(0n);
      expect(await market.bank.balanceOf(WETH, ALICE)).toBe(0n);
    });

    it("leaves the supply and the treasury untouched when the withdraw is rejected", async () => {
      const { market, vault, eventTypes } = await settledLrtDeposit({ feePerSecond: 10n ** 9n });
      market.clock.advance(1_000);

      await expect(vault.withdraw(ALICE, { ...halfWithdraw(), shareAmt: 1n })).rejects.toMatchObject({
        code: "INSUFFICIENT_WITHDRAW_VALUE",
      });
      expect(vault.totalSupply()).toBe(2_000n * E18);
      expect(vault.balanceOf(TREASURY)).toBe(0n);
      expect(vault.balanceOf(ALICE)).toBe(2_000n * E18);
      expect(eventTypes()).not.toContain("fee.minted");
    });

    it("throws INSUFFICIENT_SHARES_BALANCE for a holder without shares", async () => {
      const { vault } = await settledLrtDeposit();

      await expect(vault.withdraw(BOB, halfWithdraw())).rejects.toMatchObject({
        code: "INSUFFICIENT_SHARES_BALANCE",
      });
    });
  });

  describe("rebalance", () => {
    it("sells LRT and repays when the debt ratio is too high", async () => {
      const { market, vault } = await settledLrtDeposit();
      market.wethPool.accrueInterest(LRT_VAULT, 3n * 10n ** 17n);

      const result = await vault.rebalanceRemove(KEEPER, { rebalanceType: "Debt", lrtAmtToRemove: 48n * 10n ** 16n });

      expect(result.status).toBe("Open");
      expect(result.after.debtRatio).toBe(708_333_333_333_333_333n);
      expect(vault.lrtAmt).toBe(192n * 10n ** 16n);
      expect(market.wethPool.debtOf(LRT_VAULT)).toBe(17n * 10n ** 17n);
    });

    it("lands in Rebalance_Open when one step is not enough", async () => {
      const { market, vault, lastEvent } = await settledLrtDeposit();
      market.wethPool.accrueInterest(LRT_VAULT, 3n * 10n ** 17n);

      const result = await vault.rebalanceRemove(KEEPER, { rebalanceType: "Debt", lrtAmtToRemove: 8n * 10n ** 16n });

      expect(result.status).toBe("Rebalance_Open");
      expect(lastEvent("rebalance.open")?.payload).toMatchObject({ code: "REBALANCE_DEBT_RATIO_OUT_OF_BOUNDS" });

      await vault.rebalanceClose(OWNER);
      expect(vault.status).toBe("Open");
    });

    it("borrows and buys LRT when the debt ratio is too low", async () => {
      const { market, vault } = await settledLrtDeposit();
      market.oracle.setPrice(RSETH, 4_000n * 10n ** 8n);

      const result = await vault.rebalanceAdd(KEEPER, { rebalanceType: "Debt", borrowAmt: 3n * E18 });

      expect(result.status).toBe("Open");
      expect(vault.lrtAmt).toBe(39n * 10n ** 17n);
      expect(market.wethPool.debtOf(LRT_VAULT)).toBe(5n * E18);
    });

    it("has no delta rebalance", async () => {
      const { vault } = await settledLrtDeposit();

      await expect(
        vault.rebalanceAdd(KEEPER, { rebalanceType: "Delta", borrowAmt: E18 }),
      ).rejects.toMatchObject({ code: "INVALID_REBALANCE_TYPE" });
    });
  });

  describe("compound", () => {
    it("swaps the reward into the LRT and tracks it", async () => {
      const { market, vault } = await settledLrtDeposit();
      market.fund(LRT_VAULT, "arb", 100n * E18);

      const out = await vault.compound(KEEPER, { tokenIn: "arb", tokenOut: RSETH, amountIn: 100n * E18 });

      expect(out).toBe(2n * 10n ** 16n);
      expect(vault.lrtAmt).toBe(242n * 10n ** 16n);
      expect(vault.status).toBe("Open");
    });

    it("raises the tracked LRT to the custody balance", async () => {
      const { market, vault } = await settledLrtDeposit();
      market.fund(LRT_VAULT, RSETH, 10n ** 17n);

      await expect(vault.compoundPositionUnit(KEEPER)).resolves.toBe(25n * 10n ** 17n);
    });
  });

  describe("emergency", () => {
    it("repays all debt from the sold LRT", async () => {
      const { market, vault } = await settledLrtDeposit();
      await vault.emergencyPause(KEEPER);

      const repaid = await vault.emergencyRepay(OWNER);

      expect(repaid).toBe(2n * E18);
      expect(vault.status).toBe("Repaid");
      expect(vault.lrtAmt).toBe(0n);
      expect(market.wethPool.debtOf(LRT_VAULT)).toBe(0n);
      expect(await market.bank.balanceOf(WETH, LRT_VAULT)).toBe(E18);
    });

    it("re-borrows and resumes into the LRT", async () => {
      const { vault } = await settledLrtDeposit();
      await vault.emergencyPause(KEEPER);
      await vault.emergencyRepay(OWNER);

      await expect(vault.emergencyBorrow(OWNER)).resolves.toBe(2n * E18);
      expect(vault.status).toBe("Paused");

      await expect(vault.emergencyResume(OWNER)).resolves.toBe(24n * 10n ** 17n);
      expect(vault.status).toBe("Open");
      expect(await vault.equityValue()).toBe(2_000n * E18);
    });

    it("pays a pro-rata slice of custody after close", async () => {
      const { market, vault } = await settledLrtDeposit();
      await vault.emergencyPause(KEEPER);
      await vault.emergencyRepay(OWNER);
      await vault.emergencyClose(OWNER);

      const out = await vault.emergencyWithdraw(ALICE, 1_000n * E18);

      expect(out).toEqual({ base: 5n * 10n ** 17n, lrt: 0n });
      expect(await market.bank.balanceOf(WETH, ALICE)).toBe(5n * 10n ** 17n);
      expect(vault.totalSupply()).toBe(1_000n * E18);
    });
  });
});
