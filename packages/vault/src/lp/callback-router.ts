/**
 * Callback router — matches a venue notification against the pending
 * request and the vault status, then runs exactly one continuation.
 *
 * A callback runs only when all of these hold:
 * - a request is pending
 * - its key equals the callback's key
 * - its kind (add/remove) equals the callback's kind
 * - the current status has a continuation for that callback
 *
 * Anything else is rejected with state unchanged and a
 * `callback.rejected` event.
 *
 * A continuation that throws leaves the request pending, so the same
 * callback can be delivered again once the cause (a stale feed, say) is
 * cleared.
 */

import type { CallbackOutcome, RequestKey, VaultStatus } from "@levyield/types";
import type { EventContext } from "../events.js";
import { processCompound, processCompoundCancellation } from "./compound.js";
import {
  processDeposit,
  processDepositCancellation,
  processDepositFailureCancellation,
  processDepositFailureLiquidityWithdrawal,
} from "./deposit.js";
import {
  processEmergencyRepay,
  processEmergencyRepayCancellation,
  processEmergencyResume,
  processEmergencyResumeCancellation,
} from "./emergency.js";
import {
  processRebalanceAdd,
  processRebalanceAddCancellation,
  processRebalanceRemove,
  processRebalanceRemoveCancellation,
} from "./rebalance.js";
import type { LpContext } from "./types.js";
import {
  processWithdraw,
  processWithdrawCancellation,
  processWithdrawFailureCancellation,
  processWithdrawFailureLiquidityAdded,
} from "./withdraw.js";

// =============================================================================
// Tables
// =============================================================================

export interface Continuation<Args extends readonly unknown[]> {
  readonly name: string;
  readonly run: (ctx: LpContext, ev: EventContext, ...args: Args) => Promise<void>;
}

export type RouteTable<Args extends readonly unknown[]> = Partial<Record<VaultStatus, Continuation<Args>>>;

export const ADD_EXECUTED: RouteTable<[lpReceived: bigint]> = {
  Deposit: { name: "processDeposit", run: processDeposit },
  Rebalance_Add: { name: "processRebalanceAdd", run: processRebalanceAdd },
  Compound: { name: "processCompound", run: processCompound },
  Withdraw_Failed: { name: "processWithdrawFailureLiquidityAdded", run: processWithdrawFailureLiquidityAdded },
  Resume: { name: "processEmergencyResume", run: processEmergencyResume },
};

export const ADD_CANCELLED: RouteTable<[]> = {
  Deposit: { name: "processDepositCancellation", run: processDepositCancellation },
  Rebalance_Add: { name: "processRebalanceAddCancellation", run: processRebalanceAddCancellation },
  Compound: { name: "processCompoundCancellation", run: processCompoundCancellation },
  Withdraw_Failed: { name: "processWithdrawFailureCancellation", run: processWithdrawFailureCancellation },
  Resume: { name: "processEmergencyResumeCancellation", run: processEmergencyResumeCancellation },
};

export const REMOVE_EXECUTED: RouteTable<[tokenAReceived: bigint, tokenBReceived: bigint]> = {
  Withdraw: { name: "processWithdraw", run: processWithdraw },
  Rebalance_Remove: { name: "processRebalanceRemove", run: processRebalanceRemove },
  Deposit_Failed: {
    name: "processDepositFailureLiquidityWithdrawal",
    run: processDepositFailureLiquidityWithdrawal,
  },
  Repay: { name: "processEmergencyRepay", run: processEmergencyRepay },
};

export const REMOVE_CANCELLED: RouteTable<[]> = {
  Withdraw: { name: "processWithdrawCancellation", run: processWithdrawCancellation },
  Rebalance_Remove: { name: "processRebalanceRemoveCancellation", run: processRebalanceRemoveCancellation },
  Deposit_Failed: { name: "processDepositFailureCancellation", run: processDepositFailureCancellation },
  Repay: { name: "processEmergencyRepayCancellation", run: processEmergencyRepayCancellation },
};

// =============================================================================
// Dispatch
// =============================================================================

export interface IncomingCallback<Args extends readonly unknown[]> {
  readonly key: RequestKey;
  readonly kind: "add" | "remove";
  readonly table: RouteTable<Args>;
  readonly args: Args;
}

export async function routeCallback<Args extends readonly unknown[]>(
  ctx: LpContext,
  callback: IncomingCallback<Args>,
): Promise<CallbackOutcome> {
  const ev: EventContext = { actor: ctx.address, correlationId: callback.key, source: "venue" };
  const pending = ctx.store.pending;
  const status = ctx.state.status;

  const reject = (reason: "UNMATCHED_KEY" | "UNMATCHED_STATUS" | "NO_PENDING_REQUEST"): CallbackOutcome => {
    ctx.emit("callback.rejected", ev, {
      reason,
      kind: callback.kind,
      status,
      pendingKey: pending?.key ?? null,
    });
    return { handled: false, reason };
  };

  if (pending === null) return reject("NO_PENDING_REQUEST");
  if (pending.key !== callback.key) return reject("UNMATCHED_KEY");

  const continuation = callback.table[status];
  if (pending.kind !== callback.kind || continuation === undefined) return reject("UNMATCHED_STATUS");

  // Prices every feed before anything moves
  await ctx.reader.accounts();

  ctx.store.pending = null;
  try {
    await continuation.run(ctx, ev, ...callback.args);
  } catch (err) {
    ctx.store.pending = pending;
    throw err;
  }
  return { handled: true, route: continuation.name };
}
