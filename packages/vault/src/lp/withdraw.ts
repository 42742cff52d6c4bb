/**
 * LP withdraw saga.
 *
 * Shares are escrowed on the vault's own address while the removal is
 * pending and burned only once the after-checks pass.
 *
 *   withdraw ──► Withdraw ──remove executed──► processWithdraw ──► Open
 *                   │                              │
 *                   └─remove cancelled──► shares back
 *                                                  └─after-checks fail──► Withdraw_Failed
 *
 *   Withdraw_Failed ──processWithdrawFailure──► re-borrow, add requested
 *       ├─add executed──► shares back ──► Open
 *       └─add cancelled──► repay re-borrow ──► Withdraw_Failed (retry)
 */

import { checkedSub, mulDiv, SAFE_MULTIPLIER } from "@levyield/math";
import type { Address, RequestKey, TokenRef } from "@levyield/types";
import {
  afterWithdrawChecks,
  assertStatus,
  beforeWithdrawChecks,
  requireCache,
  withdrawValueChecks,
} from "../checks.js";
import { VaultError } from "../errors.js";
import type { EventContext } from "../events.js";
import { ZERO_PAIR } from "./types.js";
import type { LpContext, LpVaultConfig, LpWithdrawParams, TokenPair, WithdrawRequestResult } from "./types.js";

function resolveWithdrawToken(config: LpVaultConfig, address: Address): TokenRef {
  if (address === config.tokenA.address) return config.tokenA;
  if (address === config.tokenB.address) return config.tokenB;
  throw new VaultError("INVALID_WITHDRAW_TOKEN", `${address} is not a withdraw token of this vault`, {
    token: address,
  });
}

// =============================================================================
// Request
// =============================================================================

export async function withdraw(
  ctx: LpContext,
  user: Address,
  params: LpWithdrawParams,
): Promise<WithdrawRequestResult> {
  const { shareAmt, slippage } = params;
  beforeWithdrawChecks({
    status: ctx.state.status,
    shareAmt,
    shareBalance: ctx.shares.balanceOf(user),
    slippage,
    params: ctx.state.params,
  });
  const token = resolveWithdrawToken(ctx.config, params.token);
  const unwrap = params.unwrap === true && token.address === ctx.wrappedNative.address;

  const before = await ctx.reader.health();

  // Ratio against the supply including pending fee shares; those are minted once every check passes
  const shareRatio = mulDiv(shareAmt, SAFE_MULTIPLIER, ctx.supplyWithFee());
  const lpAmt = mulDiv(ctx.store.lpAmt, shareRatio, SAFE_MULTIPLIER);
  const withdrawValue = mulDiv(before.equityValue, shareRatio, SAFE_MULTIPLIER);
  withdrawValueChecks(withdrawValue, ctx.state.params);
  ctx.collectFee({ actor: user, correlationId: ctx.events.nextLocalId("fee") });

  const key = await ctx.manager.removeLiquidity(lpAmt, slippage);
  ctx.shares.transfer(user, ctx.address, shareAmt);

  ctx.store.withdrawCache = {
    user,
    token,
    shareAmt,
    shareRatio,
    lpAmt,
    withdrawValue,
    minWithdrawAmt: params.minWithdrawAmt,
    slippage,
    unwrap,
    before,
    after: null,
    repaid: ZERO_PAIR,
    assetsOut: 0n,
    reborrowed: ZERO_PAIR,
  };
  ctx.store.pending = { key, kind: "remove" };

  const ev: EventContext = { actor: user, correlationId: key };
  ctx.setStatus("Withdraw", ev);
  ctx.emit("withdraw.requested", ev, {
    token: token.symbol,
    shareAmt,
    shareRatio,
    lpAmt,
    withdrawValue,
  });

  return { key, shareRatio, lpAmt, withdrawValue };
}

// =============================================================================
// Continuations
// =============================================================================

/**
 * Repay the share of debt, convert what is left to the withdraw token
 * and pay the user, or park the result in Withdraw_Failed.
 */
export async function processWithdraw(
  ctx: LpContext,
  ev: EventContext,
  tokenAReceived: bigint,
  tokenBReceived: bigint,
): Promise<void> {
  const cache = requireCache(ctx.store.withdrawCache, "processWithdraw");
  const { tokenA, tokenB } = ctx.config;
  const swapSlippage = ctx.state.params.swapSlippage;

  const repay = await ctx.manager.calcRepay(cache.shareRatio);
  const left = await ctx.manager.swapForRepay(
    repay,
    { tokenA: tokenAReceived, tokenB: tokenBReceived },
    swapSlippage,
  );
  await ctx.manager.repay(repay);
  const lpAmtAfter = checkedSub(ctx.store.lpAmt, cache.lpAmt);

  const assetsOut = cache.token.address === tokenA.address
    ? left.tokenA + (await ctx.trade.swapExactIn(tokenB, tokenA, left.tokenB, swapSlippage))
    : left.tokenB + (await ctx.trade.swapExactIn(tokenA, tokenB, left.tokenA, swapSlippage));

  const after = await ctx.reader.health(lpAmtAfter);
  ctx.store.lpAmt = lpAmtAfter;
  cache.after = after;
  cache.repaid = repay;
  cache.assetsOut = assetsOut;

  const result = afterWithdrawChecks({
    before: cache.before,
    after,
    assetsOut,
    minWithdrawAmt: cache.minWithdrawAmt,
    params: ctx.state.params,
  });
  if (!result.ok) {
    ctx.setStatus("Withdraw_Failed", ev);
    ctx.emit("withdraw.failed", ev, {
      code: result.error.code,
      reason: result.error.message,
      assetsOut,
    });
    return;
  }

  ctx.shares.burn(ctx.address, cache.shareAmt);
  const form = await ctx.payout(cache.user, cache.token, assetsOut, cache.unwrap);
  ctx.emit("withdraw.completed", ev, {
    user: cache.user,
    shares: cache.shareAmt,
    token: cache.token.symbol,
    assetsOut,
    payout: form,
    repaidTokenA: repay.tokenA,
    repaidTokenB: repay.tokenB,
  });
  ctx.store.withdrawCache = null;
  ctx.returnToOpen(ev);
}

export async function processWithdrawCancellation(ctx: LpContext, ev: EventContext): Promise<void> {
  const cache = requireCache(ctx.store.withdrawCache, "processWithdrawCancellation");
  ctx.shares.transfer(ctx.address, cache.user, cache.shareAmt);
  ctx.emit("withdraw.cancelled", ev, { user: cache.user, shares: cache.shareAmt });
  ctx.store.withdrawCache = null;
  ctx.returnToOpen(ev);
}

// =============================================================================
// Failure recovery
// =============================================================================

/**
 * Put the withdrawn position back: re-borrow what was repaid and add it
 * to the pool together with the proceeds that were kept from the user.
 */
export async function processWithdrawFailure(ctx: LpContext, caller: Address): Promise<RequestKey> {
  assertStatus(ctx.state.status, ["Withdraw_Failed"], "processWithdrawFailure");
  const cache = requireCache(ctx.store.withdrawCache, "processWithdrawFailure");

  await ctx.manager.borrow(cache.repaid);
  cache.reborrowed = cache.repaid;

  const isTokenA = cache.token.address === ctx.config.tokenA.address;
  const amounts: TokenPair = {
    tokenA: cache.repaid.tokenA + (isTokenA ? cache.assetsOut : 0n),
    tokenB: cache.repaid.tokenB + (isTokenA ? 0n : cache.assetsOut),
  };
  const key = await ctx.manager.addLiquidity(amounts, ctx.state.params.swapSlippage);
  ctx.store.pending = { key, kind: "add" };
  ctx.emit("withdraw.recovery_requested", { actor: caller, correlationId: key }, {
    tokenAAmt: amounts.tokenA,
    tokenBAmt: amounts.tokenB,
  });
  return key;
}

export async function processWithdrawFailureLiquidityAdded(
  ctx: LpContext,
  ev: EventContext,
  lpReceived: bigint,
): Promise<void> {
  const cache = requireCache(ctx.store.withdrawCache, "processWithdrawFailureLiquidityAdded");
  ctx.store.lpAmt += lpReceived;
  ctx.shares.transfer(ctx.address, cache.user, cache.shareAmt);
  ctx.emit("withdraw.recovered", ev, { user: cache.user, shares: cache.shareAmt, lpReceived });
  ctx.store.withdrawCache = null;
  ctx.returnToOpen(ev);
}

/** The re-add was refused: repay the re-borrow and wait for a retry. */
export async function processWithdrawFailureCancellation(ctx: LpContext, ev: EventContext): Promise<void> {
  const cache = requireCache(ctx.store.withdrawCache, "processWithdrawFailureCancellation");
  await ctx.manager.repay(cache.reborrowed);
  cache.reborrowed = ZERO_PAIR;
  ctx.emit("withdraw.recovery_cancelled", ev, { user: cache.user });
}
