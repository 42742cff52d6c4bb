/**
 * LP compound: swap a reward into tokenA or tokenB and add every idle
 * tokenA/tokenB balance back into the pool.
 */

import type { Address, RequestKey, TokenRef } from "@levyield/types";
import { assertStatus, requireCache } from "../checks.js";
import { VaultError } from "../errors.js";
import type { EventContext } from "../events.js";
import type { CompoundParams, LpContext, LpVaultConfig } from "./types.js";

function knownToken(config: LpVaultConfig, address: Address): TokenRef | undefined {
  return [config.tokenA, config.tokenB, config.rewardToken, ...(config.extraDepositTokens ?? [])].find(
    (t) => t.address === address,
  );
}

/**
 * @returns the add request key, or null when there was nothing to add
 */
export async function compound(
  ctx: LpContext,
  caller: Address,
  params: CompoundParams,
): Promise<RequestKey | null> {
  assertStatus(ctx.state.status, ["Open"], "compound");
  const { tokenA, tokenB } = ctx.config;

  const tokenIn = knownToken(ctx.config, params.tokenIn);
  const tokenOut = [tokenA, tokenB].find((t) => t.address === params.tokenOut);
  if (tokenIn === undefined || tokenOut === undefined || tokenIn.address === tokenOut.address) {
    throw new VaultError("INVALID_COMPOUND_TOKEN", `Cannot compound ${params.tokenIn} into ${params.tokenOut}`, {
      tokenIn: params.tokenIn,
      tokenOut: params.tokenOut,
    });
  }

  const held = await ctx.bank.balanceOf(tokenIn.address, ctx.address);
  if (params.amountIn <= 0n || params.amountIn > held) {
    throw new VaultError(
      "INVALID_COMPOUND_AMOUNT",
      `amountIn ${params.amountIn} must be in (0, ${held}]`,
    );
  }

  const before = await ctx.reader.health();
  const slippage = ctx.state.params.swapSlippage;
  const amountOut = await ctx.trade.swapExactIn(tokenIn, tokenOut, params.amountIn, slippage);
  const idle = await ctx.manager.idleBalances();

  if (idle.tokenA === 0n && idle.tokenB === 0n) {
    ctx.emit(
      "compound.completed",
      { actor: caller, correlationId: ctx.events.nextLocalId("compound"), source: "keeper" },
      { amountIn: params.amountIn, amountOut, lpReceived: 0n },
    );
    return null;
  }

  const key = await ctx.manager.addLiquidity(idle, slippage);
  ctx.store.compoundCache = {
    tokenIn,
    tokenOut,
    amountIn: params.amountIn,
    amountOut,
    added: idle,
    before,
  };
  ctx.store.pending = { key, kind: "add" };

  const ev: EventContext = { actor: caller, correlationId: key, source: "keeper" };
  ctx.setStatus("Compound", ev);
  ctx.emit("compound.requested", ev, {
    tokenIn: tokenIn.symbol,
    tokenOut: tokenOut.symbol,
    amountIn: params.amountIn,
    amountOut,
    tokenAAmt: idle.tokenA,
    tokenBAmt: idle.tokenB,
  });
  return key;
}

export async function processCompound(ctx: LpContext, ev: EventContext, lpReceived: bigint): Promise<void> {
  const cache = requireCache(ctx.store.compoundCache, "processCompound");
  ctx.store.lpAmt += lpReceived;
  ctx.emit("compound.completed", ev, {
    amountIn: cache.amountIn,
    amountOut: cache.amountOut,
    lpReceived,
  });
  ctx.store.compoundCache = null;
  ctx.returnToOpen(ev);
}

/** Tokens are back in custody; they go in with the next compound. */
export async function processCompoundCancellation(ctx: LpContext, ev: EventContext): Promise<void> {
  const cache = requireCache(ctx.store.compoundCache, "processCompoundCancellation");
  ctx.emit("compound.cancelled", ev, { tokenAAmt: cache.added.tokenA, tokenBAmt: cache.added.tokenB });
  ctx.store.compoundCache = null;
  ctx.returnToOpen(ev);
}

/**
 * Raise the tracked LP amount to the custody balance (LP sent to the
 * vault directly, or left over).
 */
export async function compoundPositionUnit(ctx: LpContext, caller: Address): Promise<bigint> {
  assertStatus(ctx.state.status, ["Open"], "compoundPositionUnit");
  const balance = await ctx.manager.lpBalance();
  const previous = ctx.store.lpAmt;
  if (balance > previous) {
    ctx.store.lpAmt = balance;
    ctx.emit(
      "compound.position_synced",
      { actor: caller, correlationId: ctx.events.nextLocalId("compound"), source: "keeper" },
      { from: previous, to: balance },
    );
  }
  return ctx.store.lpAmt;
}
