/**
 * LRT deposit: borrow, buy LRT and mint shares in one call.
 *
 * A deposit that fails its after-checks is unwound before the error is
 * thrown: the LRT bought is sold, the borrow repaid and the rest
 * returned to the user.
 */

import { applySlippage, maxBigInt, minBigInt, subOrZero } from "@levyield/math";
import { NATIVE_TOKEN } from "@levyield/types";
import type { Address, TokenRef } from "@levyield/types";
import { afterDepositChecks, assertStatus, beforeDepositChecks } from "../checks.js";
import { VaultError } from "../errors.js";
import type { EventContext } from "../events.js";
import type {
  LrtContext,
  LrtDepositParams,
  LrtDepositResult,
  LrtDepositTokenKind,
  LrtVaultConfig,
} from "./types.js";

function resolveDepositToken(
  config: LrtVaultConfig,
  address: Address,
): { readonly token: TokenRef; readonly kind: LrtDepositTokenKind } {
  if (address === config.wrappedNative.address) return { token: config.wrappedNative, kind: "base" };
  if (address === config.lrt.address) return { token: config.lrt, kind: "lrt" };
  const other = config.extraDepositTokens?.find((t) => t.address === address);
  if (other !== undefined) return { token: other, kind: "other" };
  throw new VaultError("INVALID_DEPOSIT_TOKEN", `${address} is not a deposit token of this vault`, {
    token: address,
  });
}

export async function deposit(
  ctx: LrtContext,
  user: Address,
  params: LrtDepositParams,
  native: boolean,
): Promise<LrtDepositResult> {
  assertStatus(ctx.state.status, ["Open"], "deposit");
  const { token, kind } = resolveDepositToken(
    ctx.config,
    native ? ctx.wrappedNative.address : params.token,
  );
  const { amount, slippage } = params;
  const depositValue = await ctx.oracle.valueOf(token, amount);

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
  const ev: EventContext = { actor: user, correlationId: ctx.events.nextLocalId("deposit") };

  // ─── Funds in ───────────────────────────────────────────────────────

  if (native) {
    await ctx.bank.transfer(NATIVE_TOKEN, user, ctx.address, amount);
    await ctx.bank.wrapNative(ctx.address, amount);
  } else {
    await ctx.bank.transfer(token.address, user, ctx.address, amount);
  }

  let baseIn = 0n;
  if (kind === "base") baseIn = amount;
  if (kind === "other") baseIn = await ctx.trade.swapExactIn(token, ctx.wrappedNative, amount, slippage);

  const borrowed = await ctx.manager.calcBorrow(depositValue);
  await ctx.manager.borrow(borrowed);
  const lrtBought = await ctx.manager.buyLrt(baseIn + borrowed, slippage);
  const lrtAdded = lrtBought + (kind === "lrt" ? amount : 0n);
  ctx.store.lrtAmt += lrtAdded;

  const after = await ctx.reader.health();
  const sharesToUser = ctx.valueToShares(
    subOrZero(after.equityValue, before.equityValue),
    before.equityValue,
  );

  const result = afterDepositChecks({ before, after, sharesToUser, minSharesAmt, params: ctx.state.params });
  if (!result.ok) {
    // ─── Unwind ─────────────────────────────────────────────────────
    ctx.store.lrtAmt -= lrtAdded;
    const baseBack = await ctx.manager.sellLrt(lrtBought, ctx.state.params.swapSlippage);
    const repaid = minBigInt(baseBack, borrowed);
    await ctx.manager.repay(repaid);
    const refund = baseBack - repaid;
    await ctx.payout(user, ctx.wrappedNative, refund, native);
    if (kind === "lrt") {
      await ctx.payout(user, ctx.config.lrt, amount, false);
    }
    ctx.emit("deposit.failed", ev, {
      code: result.error.code,
      reason: result.error.message,
      refunded: refund,
    });
    throw result.error;
  }

  ctx.collectFee(ev);
  ctx.shares.mint(user, sharesToUser);
  ctx.store.depositCache = {
    user,
    token,
    tokenKind: kind,
    amount,
    depositValue,
    borrowed,
    lrtBought,
    minSharesAmt,
    before,
    after,
    sharesToUser,
  };
  ctx.emit("deposit.completed", ev, {
    user,
    token: token.symbol,
    amount,
    depositValue,
    borrowed,
    lrtBought,
    shares: sharesToUser,
  });

  return { shares: sharesToUser, depositValue, borrowed, lrtBought };
}
