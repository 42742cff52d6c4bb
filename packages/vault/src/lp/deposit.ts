/**
 * LP deposit saga.
 *
 *   deposit ──► Deposit ──add executed──► processDeposit ──► Open
 *                  │                          │
 *                  └─add cancelled──► refund  └─after-checks fail──► Deposit_Failed
 *
 *   Deposit_Failed ──processDepositFailure──► remove requested
 *       ├─remove executed──► unwind, repay, refund ──► Open
 *       └─remove cancelled──► Deposit_Failed (retry)
 */

import {
  applySlippage,
  checkedSub,
  maxBigInt,
  mulDiv,
  SAFE_MULTIPLIER,
  subOrZero,
} from "@levyield/math";
import { NATIVE_TOKEN } from "@levyield/types";
import type { Address, RequestKey, TokenRef } from "@levyield/types";
import { afterDepositChecks, assertStatus, beforeDepositChecks, requireCache } from "../checks.js";
import { VaultError } from "../errors.js";
import type { EventContext } from "../events.js";
import type {
  DepositRequestResult,
  DepositTokenKind,
  LpContext,
  LpDepositParams,
  LpVaultConfig,
} from "./types.js";

// =============================================================================
// Token classification
// =============================================================================

interface ResolvedToken {
  readonly token: TokenRef;
  readonly kind: DepositTokenKind;
}

export function resolveDepositToken(config: LpVaultConfig, address: Address): ResolvedToken {
  if (address === config.tokenA.address) return { token: config.tokenA, kind: "tokenA" };
  if (address === config.tokenB.address) return { token: config.tokenB, kind: "tokenB" };
  if (address === config.lpToken.address) return { token: config.lpToken, kind: "lp" };
  const other = config.extraDepositTokens?.find((t) => t.address === address);
  if (other !== undefined) return { token: other, kind: "other" };
  throw new VaultError("INVALID_DEPOSIT_TOKEN", `${address} is not a deposit token of this vault`, {
    token: address,
  });
}

// =============================================================================
// Request
// =============================================================================

export async function deposit(
  ctx: LpContext,
  user: Address,
  params: LpDepositParams,
  native: boolean,
): Promise<DepositRequestResult> {
  assertStatus(ctx.state.status, ["Open"], "deposit");
  const { token, kind } = resolveDepositToken(
    ctx.config,
    native ? ctx.wrappedNative.address : params.token,
  );
  const { amount, slippage } = params;

  const accounts = await ctx.reader.accounts();
  const depositValue = kind === "lp"
    ? mulDiv(amount, accounts.lpTokenValue, SAFE_MULTIPLIER)
    : await ctx.oracle.valueOf(token, amount);

  beforeDepositChecks({
    status: ctx.state.status,
    amount,
    slippage,
    depositValue,
    additionalCapacity: await ctx.reader.additionalCapacity(),
    params: ctx.state.params,
  });

  const before = await ctx.reader.health();
  const minSharesAmt = maxBigInt(
    params.minSharesAmt,
    applySlippage(ctx.valueToShares(depositValue, before.equityValue), slippage),
  );

  // ─── Funds in ───────────────────────────────────────────────────────

  if (native) {
    await ctx.bank.transfer(NATIVE_TOKEN, user, ctx.address, amount);
    await ctx.bank.wrapNative(ctx.address, amount);
  } else {
    await ctx.bank.transfer(token.address, user, ctx.address, amount);
  }

  const swappedToTokenB = kind === "other"
    ? await ctx.trade.swapExactIn(token, ctx.config.tokenB, amount, slippage)
    : 0n;

  const borrowed = await ctx.manager.calcBorrow(depositValue);
  await ctx.manager.borrow(borrowed);

  const key = await ctx.manager.addLiquidity(
    {
      tokenA: borrowed.tokenA + (kind === "tokenA" ? amount : 0n),
      tokenB: borrowed.tokenB + (kind === "tokenB" ? amount : swappedToTokenB),
    },
    slippage,
  );

  ctx.store.depositCache = {
    user,
    token,
    tokenKind: kind,
    amount,
    native,
    depositValue,
    depositedLp: kind === "lp" ? amount : 0n,
    swappedToTokenB,
    borrowed,
    minSharesAmt,
    slippage,
    before,
    lpReceived: 0n,
    after: null,
  };
  ctx.store.pending = { key, kind: "add" };

  const ev: EventContext = { actor: user, correlationId: key };
  ctx.setStatus("Deposit", ev);
  ctx.emit("deposit.requested", ev, {
    token: token.symbol,
    amount,
    native,
    depositValue,
    borrowedTokenA: borrowed.tokenA,
    borrowedTokenB: borrowed.tokenB,
    minSharesAmt,
  });

  return { key, depositValue, borrowed, minSharesAmt };
}

// =============================================================================
// Continuations
// =============================================================================

export async function processDeposit(ctx: LpContext, ev: EventContext, lpReceived: bigint): Promise<void> {
  const cache = requireCache(ctx.store.depositCache, "processDeposit");
  const lpAmtAfter = ctx.store.lpAmt + lpReceived + cache.depositedLp;

  const after = await ctx.reader.health(lpAmtAfter);
  ctx.store.lpAmt = lpAmtAfter;
  cache.lpReceived = lpReceived;
  cache.after = after;
  const sharesToUser = ctx.valueToShares(
    subOrZero(after.equityValue, cache.before.equityValue),
    cache.before.equityValue,
  );

  const result = afterDepositChecks({
    before: cache.before,
    after,
    sharesToUser,
    minSharesAmt: cache.minSharesAmt,
    params: ctx.state.params,
  });
  if (!result.ok) {
    ctx.setStatus("Deposit_Failed", ev);
    ctx.emit("deposit.failed", ev, {
      code: result.error.code,
      reason: result.error.message,
      lpReceived,
    });
    return;
  }

  ctx.collectFee(ev);
  ctx.shares.mint(cache.user, sharesToUser);
  ctx.emit("deposit.completed", ev, {
    user: cache.user,
    lpReceived,
    shares: sharesToUser,
    equityBefore: cache.before.equityValue,
    equityAfter: after.equityValue,
  });
  ctx.store.depositCache = null;
  ctx.returnToOpen(ev);
}

/**
 * The venue refunded the add request: repay the borrow and hand the
 * user back exactly what they deposited.
 */
export async function processDepositCancellation(ctx: LpContext, ev: EventContext): Promise<void> {
  const cache = requireCache(ctx.store.depositCache, "processDepositCancellation");
  await ctx.manager.repay(cache.borrowed);

  if (cache.tokenKind === "other") {
    await ctx.payout(cache.user, ctx.config.tokenB, cache.swappedToTokenB, false);
  } else {
    await ctx.payout(cache.user, cache.token, cache.amount, cache.native);
  }

  ctx.emit("deposit.cancelled", ev, {
    user: cache.user,
    repaidTokenA: cache.borrowed.tokenA,
    repaidTokenB: cache.borrowed.tokenB,
  });
  ctx.store.depositCache = null;
  ctx.returnToOpen(ev);
}

// =============================================================================
// Failure recovery
// =============================================================================

/**
 * Request removal of the LP minted by a deposit that failed its
 * after-checks.
 */
export async function processDepositFailure(ctx: LpContext, caller: Address): Promise<RequestKey> {
  assertStatus(ctx.state.status, ["Deposit_Failed"], "processDepositFailure");
  const cache = requireCache(ctx.store.depositCache, "processDepositFailure");

  const key = await ctx.manager.removeLiquidity(cache.lpReceived, ctx.state.params.swapSlippage);
  ctx.store.pending = { key, kind: "remove" };
  ctx.emit("deposit.recovery_requested", { actor: caller, correlationId: key }, {
    lpAmt: cache.lpReceived,
  });
  return key;
}

export async function processDepositFailureLiquidityWithdrawal(
  ctx: LpContext,
  ev: EventContext,
  tokenAReceived: bigint,
  tokenBReceived: bigint,
): Promise<void> {
  const cache = requireCache(ctx.store.depositCache, "processDepositFailureLiquidityWithdrawal");
  const { tokenA, tokenB, lpToken } = ctx.config;
  const slippage = ctx.state.params.swapSlippage;

  ctx.store.lpAmt = checkedSub(ctx.store.lpAmt, cache.lpReceived + cache.depositedLp);

  const left = await ctx.manager.swapForRepay(
    cache.borrowed,
    { tokenA: tokenAReceived, tokenB: tokenBReceived },
    slippage,
  );
  await ctx.manager.repay(cache.borrowed);

  let refundToken: TokenRef;
  let refundAmt: bigint;
  if (cache.tokenKind === "tokenA") {
    refundToken = tokenA;
    refundAmt = left.tokenA + (await ctx.trade.swapExactIn(tokenB, tokenA, left.tokenB, slippage));
  } else {
    refundToken = tokenB;
    refundAmt = left.tokenB + (await ctx.trade.swapExactIn(tokenA, tokenB, left.tokenA, slippage));
  }

  await ctx.payout(cache.user, refundToken, refundAmt, cache.native);
  await ctx.payout(cache.user, lpToken, cache.depositedLp, false);

  ctx.emit("deposit.refunded", ev, {
    user: cache.user,
    token: refundToken.symbol,
    amount: refundAmt,
    lpAmt: cache.depositedLp,
  });
  ctx.store.depositCache = null;
  ctx.returnToOpen(ev);
}

/** The removal was refused; the vault stays Deposit_Failed for a retry. */
export async function processDepositFailureCancellation(ctx: LpContext, ev: EventContext): Promise<void> {
  const cache = requireCache(ctx.store.depositCache, "processDepositFailureCancellation");
  ctx.emit("deposit.recovery_cancelled", ev, { lpAmt: cache.lpReceived });
}
