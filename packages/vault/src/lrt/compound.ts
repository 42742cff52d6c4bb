/**
 * LRT compound. Output in LRT is credited to the position; output in
 * the wrapped-native token stays in custody.
 */

import type { Address, TokenRef } from "@levyield/types";
import { assertStatus } from "../checks.js";
import { VaultError } from "../errors.js";
import type { CompoundParams } from "../lp/types.js";
import type { LrtContext } from "./types.js";

export async function compound(ctx: LrtContext, caller: Address, params: CompoundParams): Promise<bigint> {
  assertStatus(ctx.state.status, ["Open"], "compound");
  const { lrt, rewardToken, extraDepositTokens } = ctx.config;
  const base = ctx.wrappedNative;

  const tokenIn: TokenRef | undefined = [base, rewardToken, ...(extraDepositTokens ?? [])].find(
    (t) => t.address === params.tokenIn,
  );
  const tokenOut: TokenRef | undefined = [lrt, base].find((t) => t.address === params.tokenOut);
  if (tokenIn === undefined || tokenOut === undefined || tokenIn.address === tokenOut.address) {
    throw new VaultError("INVALID_COMPOUND_TOKEN", `Cannot compound ${params.tokenIn} into ${params.tokenOut}`, {
      tokenIn: params.tokenIn,
      tokenOut: params.tokenOut,
    });
  }

  const held = await ctx.bank.balanceOf(tokenIn.address, ctx.address);
  if (params.amountIn <= 0n || params.amountIn > held) {
    throw new VaultError("INVALID_COMPOUND_AMOUNT", `amountIn ${params.amountIn} must be in (0, ${held}]`);
  }

  const amountOut = await ctx.trade.swapExactIn(tokenIn, tokenOut, params.amountIn, ctx.state.params.swapSlippage);
  if (tokenOut.address === lrt.address) {
    ctx.store.lrtAmt += amountOut;
  }
  ctx.store.compoundCache = { tokenIn, tokenOut, amountIn: params.amountIn, amountOut };

  ctx.emit(
    "compound.completed",
    { actor: caller, correlationId: ctx.events.nextLocalId("compound"), source: "keeper" },
    { tokenIn: tokenIn.symbol, tokenOut: tokenOut.symbol, amountIn: params.amountIn, amountOut },
  );
  return amountOut;
}

export async function compoundPositionUnit(ctx: LrtContext, caller: Address): Promise<bigint> {
  assertStatus(ctx.state.status, ["Open"], "compoundPositionUnit");
  const balance = await ctx.manager.lrtBalance();
  const previous = ctx.store.lrtAmt;
  if (balance > previous) {
    ctx.store.lrtAmt = balance;
    ctx.emit(
      "compound.position_synced",
      { actor: caller, correlationId: ctx.events.nextLocalId("compound"), source: "keeper" },
      { from: previous, to: balance },
    );
  }
  return ctx.store.lrtAmt;
}
