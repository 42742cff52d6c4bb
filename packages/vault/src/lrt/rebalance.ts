/**
 * LRT rebalance. Debt-type only: the vault is Long, so a Delta-type
 * request fails the precondition checks with INVALID_REBALANCE_TYPE.
 */

import { checkedSub, minBigInt } from "@levyield/math";
import type { Address, HealthParams, VaultStatus } from "@levyield/types";
import { afterRebalanceChecks, beforeRebalanceChecks } from "../checks.js";
import { VaultError } from "../errors.js";
import type { EventContext } from "../events.js";
import type { LrtContext, LrtRebalanceAddParams, LrtRebalanceCache, LrtRebalanceRemoveParams } from "./types.js";

export interface LrtRebalanceResult {
  readonly status: VaultStatus;
  readonly after: HealthParams;
}

export async function rebalanceAdd(
  ctx: LrtContext,
  caller: Address,
  params: LrtRebalanceAddParams,
): Promise<LrtRebalanceResult> {
  const before = await ctx.reader.health();
  beforeRebalanceChecks({
    status: ctx.state.status,
    rebalanceType: params.rebalanceType,
    health: before,
    params: ctx.state.params,
  });
  if (params.borrowAmt <= 0n) {
    throw new VaultError("INVALID_REBALANCE_AMOUNT", `borrowAmt must be positive, got ${params.borrowAmt}`);
  }

  await ctx.manager.borrow(params.borrowAmt);
  const bought = await ctx.manager.buyLrt(params.borrowAmt, ctx.state.params.swapSlippage);
  ctx.store.lrtAmt += bought;

  return finish(ctx, caller, {
    direction: "add",
    rebalanceType: params.rebalanceType,
    borrowed: params.borrowAmt,
    repaid: 0n,
    lrtDelta: bought,
    before,
  });
}

/**
 * Sell LRT and repay. Proceeds above the outstanding debt stay in
 * custody as wrapped native.
 */
export async function rebalanceRemove(
  ctx: LrtContext,
  caller: Address,
  params: LrtRebalanceRemoveParams,
): Promise<LrtRebalanceResult> {
  const before = await ctx.reader.health();
  beforeRebalanceChecks({
    status: ctx.state.status,
    rebalanceType: params.rebalanceType,
    health: before,
    params: ctx.state.params,
  });
  const { lrtAmtToRemove } = params;
  if (lrtAmtToRemove <= 0n || lrtAmtToRemove > ctx.store.lrtAmt) {
    throw new VaultError(
      "INVALID_REBALANCE_AMOUNT",
      `lrtAmtToRemove ${lrtAmtToRemove} must be in (0, ${ctx.store.lrtAmt}]`,
    );
  }

  const baseOut = await ctx.manager.sellLrt(lrtAmtToRemove, ctx.state.params.swapSlippage);
  ctx.store.lrtAmt = checkedSub(ctx.store.lrtAmt, lrtAmtToRemove);
  const { debtAmt } = await ctx.reader.accounts();
  const repaid = minBigInt(baseOut, debtAmt);
  await ctx.manager.repay(repaid);

  return finish(ctx, caller, {
    direction: "remove",
    rebalanceType: params.rebalanceType,
    borrowed: 0n,
    repaid,
    lrtDelta: lrtAmtToRemove,
    before,
  });
}

async function finish(
  ctx: LrtContext,
  caller: Address,
  partial: Omit<LrtRebalanceCache, "after">,
): Promise<LrtRebalanceResult> {
  const after = await ctx.reader.health();
  ctx.store.rebalanceCache = { ...partial, after };
  const ev: EventContext = { actor: caller, correlationId: ctx.events.nextLocalId("rebalance"), source: "keeper" };
  const payload = {
    direction: partial.direction,
    rebalanceType: partial.rebalanceType,
    borrowed: partial.borrowed,
    repaid: partial.repaid,
    lrtDelta: partial.lrtDelta,
    delta: after.delta,
    debtRatio: after.debtRatio,
  };

  const result = afterRebalanceChecks(after, ctx.state.params);
  if (!result.ok) {
    ctx.setStatus("Rebalance_Open", ev);
    ctx.emit("rebalance.open", ev, { ...payload, code: result.error.code });
  } else {
    ctx.emit("rebalance.completed", ev, payload);
  }
  return { status: ctx.state.status, after };
}
