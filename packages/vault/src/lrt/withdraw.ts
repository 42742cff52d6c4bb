/**
 * LRT withdraw: sell the share of LRT, repay the share of debt and pay
 * out the rest in the wrapped-native token (or native).
 *
 * On a failed after-check the debt is re-borrowed, the LRT bought back
 * and the escrowed shares returned before the error is thrown.
 */

import { checkedSub, minBigInt, mulDiv, SAFE_MULTIPLIER } from "@levyield/math";
import type { Address } from "@levyield/types";
import { afterWithdrawChecks, beforeWithdrawChecks, withdrawValueChecks } from "../checks.js";
import type { EventContext } from "../events.js";
import type { LrtContext, LrtWithdrawParams, LrtWithdrawResult } from "./types.js";

export async function withdraw(
  ctx: LrtContext,
  user: Address,
  params: LrtWithdrawParams,
): Promise<LrtWithdrawResult> {
  const { shareAmt, slippage } = params;
  beforeWithdrawChecks({
    status: ctx.state.status,
    shareAmt,
    shareBalance: ctx.shares.balanceOf(user),
    slippage,
    params: ctx.state.params,
  });

  const before = await ctx.reader.health();
  const ev: EventContext = { actor: user, correlationId: ctx.events.nextLocalId("withdraw") };

  const shareRatio = mulDiv(shareAmt, SAFE_MULTIPLIER, ctx.supplyWithFee());
  const lrtSold = mulDiv(ctx.store.lrtAmt, shareRatio, SAFE_MULTIPLIER);
  withdrawValueChecks(mulDiv(before.equityValue, shareRatio, SAFE_MULTIPLIER), ctx.state.params);
  ctx.collectFee(ev);

  ctx.shares.transfer(user, ctx.address, shareAmt);
  const baseOut = await ctx.manager.sellLrt(lrtSold, slippage);
  ctx.store.lrtAmt = checkedSub(ctx.store.lrtAmt, lrtSold);

  const repaid = minBigInt(await ctx.manager.calcRepay(shareRatio), baseOut);
  await ctx.manager.repay(repaid);
  const assetsOut = baseOut - repaid;

  const after = await ctx.reader.health();
  const result = afterWithdrawChecks({
    before,
    after,
    assetsOut,
    minWithdrawAmt: params.minWithdrawAmt,
    params: ctx.state.params,
  });
  if (!result.ok) {
    // ─── Unwind ─────────────────────────────────────────────────────
    await ctx.manager.borrow(repaid);
    ctx.store.lrtAmt += await ctx.manager.buyLrt(repaid + assetsOut, ctx.state.params.swapSlippage);
    ctx.shares.transfer(ctx.address, user, shareAmt);
    ctx.emit("withdraw.failed", ev, { code: result.error.code, reason: result.error.message, assetsOut });
    throw result.error;
  }

  ctx.shares.burn(ctx.address, shareAmt);
  const form = await ctx.payout(user, ctx.wrappedNative, assetsOut, params.unwrap === true);
  ctx.store.withdrawCache = { user, shareAmt, shareRatio, lrtSold, repaid, assetsOut, before, after };
  ctx.emit("withdraw.completed", ev, {
    user,
    shares: shareAmt,
    lrtSold,
    repaid,
    assetsOut,
    payout: form,
  });

  return { assetsOut, repaid, lrtSold };
}
