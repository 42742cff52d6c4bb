/**
 * LP emergency sub-machine.
 *
 *   Paused ──emergencyRepay──► Repay ──remove executed──► Repaid
 *                                └─remove cancelled──► Paused
 *   Repaid ──emergencyBorrow──► Paused
 *   Repaid ──emergencyClose──► Closed ──emergencyWithdraw (per user)
 *   Paused ──emergencyResume──► Resume ──add executed──► Open
 *                                 └─add cancelled──► Paused
 *
 * Pause and close live in BaseVault.
 */

import { minBigInt, mulDiv } from "@levyield/math";
import type { Address, RequestKey } from "@levyield/types";
import { assertStatus } from "../checks.js";
import { VaultError } from "../errors.js";
import type { EventContext } from "../events.js";
import { ZERO_PAIR } from "./types.js";
import type { LpContext, TokenPair } from "./types.js";

export interface EmergencyWithdrawResult {
  readonly tokenA: bigint;
  readonly tokenB: bigint;
  readonly lp: bigint;
}

// =============================================================================
// Repay
// =============================================================================

/**
 * Remove the whole position and repay all debt.
 *
 * @returns the remove request key, or null when there was no LP and the
 *   repay settled immediately
 */
export async function emergencyRepay(ctx: LpContext, caller: Address): Promise<RequestKey | null> {
  assertStatus(ctx.state.status, ["Paused"], "emergencyRepay");

  // Tracked amount follows custody from here on
  ctx.store.lpAmt = await ctx.manager.lpBalance();

  if (ctx.store.lpAmt === 0n) {
    const ev: EventContext = { actor: caller, correlationId: ctx.events.nextLocalId("repay") };
    ctx.setStatus("Repay", ev);
    await processEmergencyRepay(ctx, ev, 0n, 0n);
    return null;
  }

  const key = await ctx.manager.removeLiquidity(ctx.store.lpAmt, ctx.state.params.swapSlippage);
  ctx.store.pending = { key, kind: "remove" };
  const ev: EventContext = { actor: caller, correlationId: key };
  ctx.setStatus("Repay", ev);
  ctx.emit("emergency.repay_requested", ev, { lpAmt: ctx.store.lpAmt });
  return key;
}

export async function processEmergencyRepay(
  ctx: LpContext,
  ev: EventContext,
  tokenAReceived: bigint,
  tokenBReceived: bigint,
): Promise<void> {
  const { debtAmt } = await ctx.reader.accounts(0n);
  await ctx.manager.swapForRepay(debtAmt, await ctx.manager.idleBalances(), ctx.state.params.swapSlippage);

  const idle = await ctx.manager.idleBalances();
  const repaid: TokenPair = {
    tokenA: minBigInt(idle.tokenA, debtAmt.tokenA),
    tokenB: minBigInt(idle.tokenB, debtAmt.tokenB),
  };
  await ctx.manager.repay(repaid);
  ctx.store.lpAmt = 0n;
  ctx.store.emergencyRepaid = repaid;

  ctx.setStatus("Repaid", ev);
  ctx.emit("emergency.repaid", ev, {
    tokenAReceived,
    tokenBReceived,
    repaidTokenA: repaid.tokenA,
    repaidTokenB: repaid.tokenB,
  });
}

export async function processEmergencyRepayCancellation(ctx: LpContext, ev: EventContext): Promise<void> {
  ctx.setStatus("Paused", ev);
  ctx.emit("emergency.repay_cancelled", ev, { lpAmt: ctx.store.lpAmt });
}

// =============================================================================
// Borrow / resume
// =============================================================================

/** Re-borrow what emergencyRepay repaid; back to Paused. */
export async function emergencyBorrow(ctx: LpContext, caller: Address): Promise<TokenPair> {
  assertStatus(ctx.state.status, ["Repaid"], "emergencyBorrow");
  const amounts = ctx.store.emergencyRepaid;
  await ctx.manager.borrow(amounts);
  ctx.store.emergencyRepaid = ZERO_PAIR;

  const ev: EventContext = { actor: caller, correlationId: ctx.events.nextLocalId("borrow") };
  ctx.setStatus("Paused", ev);
  ctx.emit("emergency.borrowed", ev, { tokenA: amounts.tokenA, tokenB: amounts.tokenB });
  return amounts;
}

/**
 * Put idle custody back into the pool and reopen.
 *
 * @returns the add request key, or null when nothing was idle and the
 *   vault reopened immediately
 */
export async function emergencyResume(ctx: LpContext, caller: Address): Promise<RequestKey | null> {
  assertStatus(ctx.state.status, ["Paused"], "emergencyResume");
  const idle = await ctx.manager.idleBalances();

  if (idle.tokenA === 0n && idle.tokenB === 0n) {
    const ev: EventContext = { actor: caller, correlationId: ctx.events.nextLocalId("resume") };
    reopen(ctx, ev, 0n);
    return null;
  }

  const key = await ctx.manager.addLiquidity(idle, ctx.state.params.swapSlippage);
  ctx.store.pending = { key, kind: "add" };
  const ev: EventContext = { actor: caller, correlationId: key };
  ctx.setStatus("Resume", ev);
  ctx.emit("emergency.resume_requested", ev, { tokenAAmt: idle.tokenA, tokenBAmt: idle.tokenB });
  return key;
}

export async function processEmergencyResume(ctx: LpContext, ev: EventContext, lpReceived: bigint): Promise<void> {
  ctx.store.lpAmt += lpReceived;
  reopen(ctx, ev, lpReceived);
}

export async function processEmergencyResumeCancellation(ctx: LpContext, ev: EventContext): Promise<void> {
  ctx.setStatus("Paused", ev);
  ctx.emit("emergency.resume_cancelled", ev);
}

function reopen(ctx: LpContext, ev: EventContext, lpReceived: bigint): void {
  ctx.state.pauseRequested = false;
  ctx.setStatus("Open", ev);
  ctx.emit("emergency.resumed", ev, { lpReceived });
}

// =============================================================================
// Withdraw after close
// =============================================================================

/**
 * Pay out a pro-rata slice of raw custody (tokenA, tokenB, LP) and burn
 * the shares. No fee is minted and equity is not consulted.
 */
export async function emergencyWithdraw(
  ctx: LpContext,
  user: Address,
  shareAmt: bigint,
): Promise<EmergencyWithdrawResult> {
  assertStatus(ctx.state.status, ["Closed"], "emergencyWithdraw");
  if (shareAmt <= 0n) {
    throw new VaultError("EMPTY_WITHDRAW_AMOUNT", "Withdraw share amount must be positive");
  }
  const balance = ctx.shares.balanceOf(user);
  if (balance < shareAmt) {
    throw new VaultError(
      "INSUFFICIENT_SHARES_BALANCE",
      `Balance ${balance} is below the requested ${shareAmt} shares`,
    );
  }

  const supply = ctx.shares.totalSupply();
  const idle = await ctx.manager.idleBalances();
  const lpHeld = await ctx.manager.lpBalance();
  const out: EmergencyWithdrawResult = {
    tokenA: mulDiv(idle.tokenA, shareAmt, supply),
    tokenB: mulDiv(idle.tokenB, shareAmt, supply),
    lp: mulDiv(lpHeld, shareAmt, supply),
  };

  ctx.shares.burn(user, shareAmt);
  ctx.store.lpAmt -= minBigInt(ctx.store.lpAmt, out.lp);
  await ctx.payout(user, ctx.config.tokenA, out.tokenA, false);
  await ctx.payout(user, ctx.config.tokenB, out.tokenB, false);
  await ctx.payout(user, ctx.config.lpToken, out.lp, false);

  ctx.emit("emergency.withdrawn", { actor: user, correlationId: ctx.events.nextLocalId("withdraw") }, {
    shares: shareAmt,
    tokenA: out.tokenA,
    tokenB: out.tokenB,
    lp: out.lp,
  });
  return out;
}
