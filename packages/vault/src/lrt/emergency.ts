/**
 * LRT emergency steps. Each one settles within the call:
 * Paused → Repaid on repay, Repaid → Paused on borrow, Paused → Open
 * on resume.
 */

import { minBigInt, mulDiv } from "@levyield/math";
import type { Address } from "@levyield/types";
import { assertStatus } from "../checks.js";
import { VaultError } from "../errors.js";
import type { EventContext } from "../events.js";
import type { LrtContext, LrtEmergencyWithdrawResult } from "./types.js";

export async function emergencyRepay(ctx: LrtContext, caller: Address): Promise<bigint> {
  assertStatus(ctx.state.status, ["Paused"], "emergencyRepay");
  const ev: EventContext = { actor: caller, correlationId: ctx.events.nextLocalId("repay") };
  ctx.setStatus("Repay", ev);

  const lrtHeld = await ctx.manager.lrtBalance();
  const baseOut = await ctx.manager.sellLrt(lrtHeld, ctx.state.params.swapSlippage);
  ctx.store.lrtAmt = 0n;

  const { debtAmt } = await ctx.reader.accounts();
  const repaid = minBigInt(await ctx.manager.baseBalance(), debtAmt);
  await ctx.manager.repay(repaid);
  ctx.store.emergencyRepaid = repaid;

  ctx.setStatus("Repaid", ev);
  ctx.emit("emergency.repaid", ev, { lrtSold: lrtHeld, baseOut, repaid });
  return repaid;
}

export async function emergencyBorrow(ctx: LrtContext, caller: Address): Promise<bigint> {
  assertStatus(ctx.state.status, ["Repaid"], "emergencyBorrow");
  const amount = ctx.store.emergencyRepaid;
  await ctx.manager.borrow(amount);
  ctx.store.emergencyRepaid = 0n;

  const ev: EventContext = { actor: caller, correlationId: ctx.events.nextLocalId("borrow") };
  ctx.setStatus("Paused", ev);
  ctx.emit("emergency.borrowed", ev, { amount });
  return amount;
}

/** Buy LRT with every idle wrapped-native unit and reopen. */
export async function emergencyResume(ctx: LrtContext, caller: Address): Promise<bigint> {
  assertStatus(ctx.state.status, ["Paused"], "emergencyResume");
  const ev: EventContext = { actor: caller, correlationId: ctx.events.nextLocalId("resume") };
  ctx.setStatus("Resume", ev);

  const bought = await ctx.manager.buyLrt(await ctx.manager.baseBalance(), ctx.state.params.swapSlippage);
  ctx.store.lrtAmt += bought;

  ctx.state.pauseRequested = false;
  ctx.setStatus("Open", ev);
  ctx.emit("emergency.resumed", ev, { lrtBought: bought });
  return bought;
}

export async function emergencyWithdraw(
  ctx: LrtContext,
  user: Address,
  shareAmt: bigint,
): Promise<LrtEmergencyWithdrawResult> {
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
  const out: LrtEmergencyWithdrawResult = {
    base: mulDiv(await ctx.manager.baseBalance(), shareAmt, supply),
    lrt: mulDiv(await ctx.manager.lrtBalance(), shareAmt, supply),
  };

  ctx.shares.burn(user, shareAmt);
  ctx.store.lrtAmt -= minBigInt(ctx.store.lrtAmt, out.lrt);
  await ctx.payout(user, ctx.wrappedNative, out.base, false);
  await ctx.payout(user, ctx.config.lrt, out.lrt, false);

  ctx.emit("emergency.withdrawn", { actor: user, correlationId: ctx.events.nextLocalId("withdraw") }, {
    shares: shareAmt,
    base: out.base,
    lrt: out.lrt,
  });
  return out;
}
