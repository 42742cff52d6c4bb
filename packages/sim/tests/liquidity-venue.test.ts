/**
 * Tests for SimLiquidityVenue — two-phase add / remove liquidity.
 */

import { describe, it, expect, vi } from "vitest";
import type { CallbackOutcome, LiquidityCallbackHandler } from "@levyield/types";
import { createMarket } from "../src/market.js";
import { SimError } from "../src/errors.js";

const E18 = 10n ** 18n;
const E6 = 10n ** 6n;

const handled: CallbackOutcome = { handled: true, route: "test" };

function recordingHandler() {
  return {
    afterAddLiquidityExecution: vi.fn(async () => handled),
    afterAddLiquidityCancellation: vi.fn(async () => handled),
    afterRemoveLiquidityExecution: vi.fn(async () => handled),
    afterRemoveLiquidityCancellation: vi.fn(async () => handled),
  } satisfies LiquidityCallbackHandler;
}

describe("SimLiquidityVenue", () => {
  it("escrows tokens on request and leaves the pool untouched", async () => {
    const market = createMarket();
    market.fund("vault", "weth", E18);
    market.fund("vault", "usdc", 2_000n * E6);

    const key = await market.venue.requestAddLiquidity({
      owner: "vault",
      tokenAAmt: E18,
      tokenBAmt: 2_000n * E6,
      minLpOut: 0n,
    });

    expect(key).toBe("venue:1");
    expect(await market.bank.balanceOf("weth", "vault")).toBe(0n);
    expect(await market.venue.poolState()).toEqual({
      reserveA: 500n * E18,
      reserveB: 1_000_000n * E6,
      lpSupply: 2_000_000n * E18,
    });
    expect(market.venue.pendingRequests()).toHaveLength(1);
  });

  it("mints LP at pool value on execute and notifies the owner", async () => {
    const market = createMarket();
    const handler = recordingHandler();
    market.venue.registerHandler("vault", handler);
    market.fund("vault", "weth", E18);
    market.fund("vault", "usdc", 2_000n * E6);
    const key = await market.venue.requestAddLiquidity({
      owner: "vault",
      tokenAAmt: E18,
      tokenBAmt: 2_000n * E6,
      minLpOut: 0n,
    });

    const settlement = await market.venue.execute(key);

    // $4,000 in at $1 per LP
    expect(settlement.lpOut).toBe(4_000n * E18);
    expect(settlement.callback).toEqual(handled);
    expect(handler.afterAddLiquidityExecution).toHaveBeenCalledWith(key, 4_000n * E18);
    expect(await market.bank.balanceOf("weth-usdc-lp", "vault")).toBe(4_000n * E18);
    expect(market.venue.pendingRequests()).toHaveLength(0);
  });

  it("applies a haircut to settled output", async () => {
    const market = createMarket();
    market.venue.registerHandler("vault", recordingHandler());
    market.fund("vault", "usdc", 1_000n * E6);
    const key = await market.venue.requestAddLiquidity({
      owner: "vault",
      tokenAAmt: 0n,
      tokenBAmt: 1_000n * E6,
      minLpOut: 0n,
    });

    const settlement = await market.venue.execute(key, { haircutBps: 100n });
    expect(settlement.lpOut).toBe(990n * E18);
  });

  it("cancels instead of executing below the minimum output", async () => {
    const market = createMarket();
    const handler = recordingHandler();
    market.venue.registerHandler("vault", handler);
    market.fund("vault", "usdc", 1_000n * E6);
    const key = await market.venue.requestAddLiquidity({
      owner: "vault",
      tokenAAmt: 0n,
      tokenBAmt: 1_000n * E6,
      minLpOut: 1_000n * E18,
    });

    const settlement = await market.venue.execute(key, { haircutBps: 1n });

    expect(settlement.status).toBe("cancelled");
    expect(handler.afterAddLiquidityCancellation).toHaveBeenCalledWith(key);
    expect(await market.bank.balanceOf("usdc", "vault")).toBe(1_000n * E6);
  });

  it("returns reserves pro rata on remove", async () => {
    const market = createMarket();
    const handler = recordingHandler();
    market.venue.registerHandler("lp-genesis", handler);

    const key = await market.venue.requestRemoveLiquidity({
      owner: "lp-genesis",
      lpAmt: 20_000n * E18,
      minTokenAOut: 0n,
      minTokenBOut: 0n,
    });
    const settlement = await market.venue.execute(key);

    // 1% of the pool
    expect(settlement.tokenAOut).toBe(5n * E18);
    expect(settlement.tokenBOut).toBe(10_000n * E6);
    expect(handler.afterRemoveLiquidityExecution).toHaveBeenCalledWith(key, 5n * E18, 10_000n * E6);
    expect((await market.venue.poolState()).lpSupply).toBe(1_980_000n * E18);
  });

  it("returns escrowed LP on cancel", async () => {
    const market = createMarket();
    const handler = recordingHandler();
    market.venue.registerHandler("lp-genesis", handler);
    const key = await market.venue.requestRemoveLiquidity({
      owner: "lp-genesis",
      lpAmt: 10n * E18,
      minTokenAOut: 0n,
      minTokenBOut: 0n,
    });

    await market.venue.cancel(key);

    expect(handler.afterRemoveLiquidityCancellation).toHaveBeenCalledWith(key);
    expect(await market.bank.balanceOf("weth-usdc-lp", "lp-genesis")).toBe(2_000_000n * E18);
  });

  it("rejects unknown and already-settled keys", async () => {
    const market = createMarket();
    market.venue.registerHandler("lp-genesis", recordingHandler());
    const key = await market.venue.requestRemoveLiquidity({
      owner: "lp-genesis",
      lpAmt: E18,
      minTokenAOut: 0n,
      minTokenBOut: 0n,
    });
    await market.venue.execute(key);

    await expect(market.venue.execute(key)).rejects.toBeInstanceOf(SimError);
    await expect(market.venue.cancel("venue:99")).rejects.toMatchObject({ code: "UNKNOWN_REQUEST" });
  });
});
