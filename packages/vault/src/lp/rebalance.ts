/**
 * LP rebalance.
 *
 * Add borrows the keeper's amounts and adds them to the pool; remove
 * takes LP out of the pool and repays. Either one lands in
 * Rebalance_Open when the metric is still out of band afterwards.
 */

import { checkedSub, minBigInt } from "@levyield/math";
import type { Address, RequestKey } from "@levyield/types";
import { afterRebalanceChecks, beforeRebalanceChecks, requireCache } from "../checks.js";
import { VaultError } from "../errors.js";
import type { EventContext } from "../events.js";
import { ZERO_PAIR } from "./types.js";
import type { LpContext, LpRebalanceAddParams, LpRebalanceRemoveParams, TokenPair } from "./types.js";

// =============================================================================
// Requests
// =============================================================================

export async function rebalanceAdd(
  ctx: LpContext,
  caller: Address,
  params: LpRebalanceAddParams,
): Promise<RequestKey> {
  const before = await ctx.reader.health();
  beforeRebalanceChecks({
    status: ctx.state.status,
    rebalanceType: params.rebalanceType,
    health: before,
    params: ctx.state.params,
  });

  const borrowed: TokenPair = { tokenA: params.borrowTokenAAmt, tokenB: params.borrowTokenBAmt };
  if (
    borrowed.tokenA < 0n ||
    borrowed.tokenB < 0n ||
    borrowed.tokenA + borrowed.tokenB === 0n ||
    (ctx.state.params.delta === "Long" && borrowed.tokenA > 0n)
  ) {
    throw new VaultError(
      "INVALID_REBALANCE_AMOUNT",
      `Cannot rebalance-add with borrows ${borrowed.tokenA}/${borrowed.tokenB}`,
    );
  }

  await ctx.manager.borrow(borrowed);
  const key = await ctx.manager.addLiquidity(borrowed, ctx.state.params.swapSlippage);

  ctx.store.rebalanceCache = {
    direction: "add",
    rebalanceType: params.rebalanceType,
    borrowed,
    lpAmtToRemove: 0n,
    before,
    after: null,
  };
  ctx.store.pending = { key, kind: "add" };

  const ev: EventContext = { actor: caller, correlationId: key, source: "keeper" };
  ctx.setStatus("Rebalance_Add", ev);
  ctx.emit("rebalance.requested", ev, {
    direction: "add",
    rebalanceType: params.rebalanceType,
    borrowTokenAAmt: borrowed.tokenA,
    borrowTokenBAmt: borrowed.tokenB,
  });
  return key;
}

export async function rebalanceRemove(
  ctx: LpContext,
  caller: Address,
  params: LpRebalanceRemoveParams,
): Promise<RequestKey> {
  const before = await ctx.reader.health();
  beforeRebalanceChecks({
    status: ctx.state.status,
    rebalanceType: params.rebalanceType,
    health: before,
    params: ctx.state.params,
  });

  const { lpAmtToRemove } = params;
  if (lpAmtToRemove <= 0n || lpAmtToRemove > ctx.store.lpAmt) {
    throw new VaultError(
      "INVALID_REBALANCE_AMOUNT",
      `lpAmtToRemove ${lpAmtToRemove} must be in (0, ${ctx.store.lpAmt}]`,
    );
  }

  const key = await ctx.manager.removeLiquidity(lpAmtToRemove, ctx.state.params.swapSlippage);

  ctx.store.rebalanceCache = {
    direction: "remove",
    rebalanceType: params.rebalanceType,
    borrowed: ZERO_PAIR,
    lpAmtToRemove,
    before,
    after: null,
  };
  ctx.store.pending = { key, kind: "remove" };

  const ev: EventContext = { actor: caller, correlationId: key, source: "keeper" };
  ctx.setStatus("Rebalance_Remove", ev);
  ctx.emit("rebalance.requested", ev, {
    direction: "remove",
    rebalanceType: params.rebalanceType,
    lpAmtToRemove,
  });
  return key;
}

// =============================================================================
// Continuations
// =============================================================================

export async function processRebalanceAdd(ctx: LpContext, ev: EventContext, lpReceived: bigint): Promise<void> {
  requireCache(ctx.store.rebalanceCache, "processRebalanceAdd");
  ctx.store.lpAmt += lpReceived;
  await finishRebalance(ctx, ev, { lpReceived });
}

/**
 * Repay from the removed tokens.
 *
 * Delta: everything is turned into tokenA and tokenA debt is repaid.
 * Debt, Long: everything is turned into tokenB and tokenB debt is repaid.
 * Debt, Neutral: each token repays its own debt.
 * Whatever exceeds the debt stays in custody for the next compound.
 */
export async function processRebalanceRemove(
  ctx: LpContext,
  ev: EventContext,
  tokenAReceived: bigint,
  tokenBReceived: bigint,
): Promise<void> {
  const cache = requireCache(ctx.store.rebalanceCache, "processRebalanceRemove");
  const { tokenA, tokenB } = ctx.config;
  const slippage = ctx.state.params.swapSlippage;
  const lpAmtAfter = checkedSub(ctx.store.lpAmt, cache.lpAmtToRemove);

  const { debtAmt } = await ctx.reader.accounts(lpAmtAfter);
  let repay: TokenPair;
  if (cache.rebalanceType === "Delta") {
    const totalA = tokenAReceived + (await ctx.trade.swapExactIn(tokenB, tokenA, tokenBReceived, slippage));
    repay = { tokenA: minBigInt(totalA, debtAmt.tokenA), tokenB: 0n };
  } else if (ctx.state.params.delta === "Long") {
    const totalB = tokenBReceived + (await ctx.trade.swapExactIn(tokenA, tokenB, tokenAReceived, slippage));
    repay = { tokenA: 0n, tokenB: minBigInt(totalB, debtAmt.tokenB) };
  } else {
    repay = {
      tokenA: minBigInt(tokenAReceived, debtAmt.tokenA),
      tokenB: minBigInt(tokenBReceived, debtAmt.tokenB),
    };
  }
  await ctx.manager.repay(repay);
  ctx.store.lpAmt = lpAmtAfter;

  await finishRebalance(ctx, ev, { repaidTokenA: repay.tokenA, repaidTokenB: repay.tokenB });
}

export async function processRebalanceAddCancellation(ctx: LpContext, ev: EventContext): Promise<void> {
  const cache = requireCache(ctx.store.rebalanceCache, "processRebalanceAddCancellation");
  await ctx.manager.repay(cache.borrowed);
  ctx.emit("rebalance.cancelled", ev, { direction: "add" });
  ctx.store.rebalanceCache = null;
  ctx.returnToOpen(ev);
}

export async function processRebalanceRemoveCancellation(ctx: LpContext, ev: EventContext): Promise<void> {
  requireCache(ctx.store.rebalanceCache, "processRebalanceRemoveCancellation");
  ctx.emit("rebalance.cancelled", ev, { direction: "remove" });
  ctx.store.rebalanceCache = null;
  ctx.returnToOpen(ev);
}

async function finishRebalance(
  ctx: LpContext,
  ev: EventContext,
  payload: Readonly<Record<string, bigint>>,
): Promise<void> {
  const cache = requireCache(ctx.store.rebalanceCache, "rebalance");
  const after = await ctx.reader.health();
  cache.after = after;

  const result = afterRebalanceChecks(after, ctx.state.params);
  if (!result.ok) {
    ctx.setStatus("Rebalance_Open", ev);
    ctx.emit("rebalance.open", ev, {
      ...payload,
      code: result.error.code,
      delta: after.delta,
      debtRatio: after.debtRatio,
    });
    return;
  }

  ctx.emit("rebalance.completed", ev, {
    ...payload,
    direction: cache.direction,
    delta: after.delta,
    debtRatio: after.debtRatio,
  });
  ctx.store.rebalanceCache = null;
  ctx.returnToOpen(ev);
}
