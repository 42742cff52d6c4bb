/**
 * LpVault — leveraged LP position with asynchronous venue settlement.
 *
 * Every entry point, the venue callbacks included, runs under the
 * vault's reentrancy guard. Operations that hand tokens to the venue
 * return its request key; the saga continues when the venue calls one
 * of the LiquidityCallbackHandler methods with that key.
 *
 * Usage:
 *   const vault = new LpVault(config);
 *   venue.registerHandler(vault.address, vault);
 *   const { key } = await vault.deposit(user, { token, amount, minSharesAmt: 0n, slippage: 100n });
 *   await venue.execute(key);   // → processDeposit
 */

import type {
  Address,
  CallbackOutcome,
  HealthParams,
  LiquidityCallbackHandler,
  RequestKey,
  VaultMetrics,
} from "@levyield/types";
import { BaseVault } from "../base-vault.js";
import {
  ADD_CANCELLED,
  ADD_EXECUTED,
  REMOVE_CANCELLED,
  REMOVE_EXECUTED,
  routeCallback,
} from "./callback-router.js";
import { compound, compoundPositionUnit } from "./compound.js";
import { deposit, processDepositFailure } from "./deposit.js";
import { emergencyBorrow, emergencyRepay, emergencyResume, emergencyWithdraw } from "./emergency.js";
import type { EmergencyWithdrawResult } from "./emergency.js";
import { LpManager } from "./manager.js";
import { LpReader } from "./reader.js";
import { rebalanceAdd, rebalanceRemove } from "./rebalance.js";
import { ZERO_PAIR } from "./types.js";
import type {
  CompoundParams,
  DepositRequestResult,
  LpContext,
  LpDepositParams,
  LpRebalanceAddParams,
  LpRebalanceRemoveParams,
  LpStore,
  LpVaultConfig,
  LpWithdrawParams,
  PendingRequest,
  TokenPair,
  WithdrawRequestResult,
} from "./types.js";
import { processWithdrawFailure, withdraw } from "./withdraw.js";

export class LpVault extends BaseVault implements LiquidityCallbackHandler {
  readonly reader: LpReader;

  private readonly config: LpVaultConfig;
  private readonly store: LpStore = {
    lpAmt: 0n,
    pending: null,
    depositCache: null,
    withdrawCache: null,
    rebalanceCache: null,
    compoundCache: null,
    emergencyRepaid: ZERO_PAIR,
  };
  private readonly manager: LpManager;

  constructor(config: LpVaultConfig) {
    super(config, ["Neutral", "Long"]);
    this.config = config;
    const kernel = this.kernel();
    this.reader = new LpReader(kernel, config, this.store);
    this.manager = new LpManager(kernel, config, this.reader);
  }

  // ─── Views ──────────────────────────────────────────────────────────

  get lpAmt(): bigint {
    return this.store.lpAmt;
  }

  pendingRequest(): PendingRequest | null {
    return this.store.pending;
  }

  override equityValue(): Promise<bigint> {
    return this.reader.equityValue();
  }

  override health(): Promise<HealthParams> {
    return this.reader.health();
  }

  override metrics(): Promise<VaultMetrics> {
    return this.reader.metrics();
  }

  // ─── User operations ────────────────────────────────────────────────

  async deposit(user: Address, params: LpDepositParams): Promise<DepositRequestResult> {
    return this.guard.run("deposit", () => deposit(this.context(), user, params, false));
  }

  /** Deposit the native asset; it is wrapped before anything else. */
  async depositNative(user: Address, params: Omit<LpDepositParams, "token">): Promise<DepositRequestResult> {
    return this.guard.run("depositNative", () =>
      deposit(this.context(), user, { ...params, token: this.wrappedNative.address }, true),
    );
  }

  async withdraw(user: Address, params: LpWithdrawParams): Promise<WithdrawRequestResult> {
    return this.guard.run("withdraw", () => withdraw(this.context(), user, params));
  }

  async emergencyWithdraw(user: Address, shareAmt: bigint): Promise<EmergencyWithdrawResult> {
    return this.guard.run("emergencyWithdraw", () => emergencyWithdraw(this.context(), user, shareAmt));
  }

  // ─── Keeper operations ──────────────────────────────────────────────

  async rebalanceAdd(caller: Address, params: LpRebalanceAddParams): Promise<RequestKey> {
    return this.guard.run("rebalanceAdd", async () => {
      this.access.assertKeeper(caller, "rebalanceAdd");
      return rebalanceAdd(this.context(), caller, params);
    });
  }

  async rebalanceRemove(caller: Address, params: LpRebalanceRemoveParams): Promise<RequestKey> {
    return this.guard.run("rebalanceRemove", async () => {
      this.access.assertKeeper(caller, "rebalanceRemove");
      return rebalanceRemove(this.context(), caller, params);
    });
  }

  async compound(caller: Address, params: CompoundParams): Promise<RequestKey | null> {
    return this.guard.run("compound", async () => {
      this.access.assertKeeper(caller, "compound");
      return compound(this.context(), caller, params);
    });
  }

  async compoundPositionUnit(caller: Address): Promise<bigint> {
    return this.guard.run("compoundPositionUnit", async () => {
      this.access.assertKeeper(caller, "compoundPositionUnit");
      return compoundPositionUnit(this.context(), caller);
    });
  }

  async processDepositFailure(caller: Address): Promise<RequestKey> {
    return this.guard.run("processDepositFailure", async () => {
      this.access.assertKeeper(caller, "processDepositFailure");
      return processDepositFailure(this.context(), caller);
    });
  }

  async processWithdrawFailure(caller: Address): Promise<RequestKey> {
    return this.guard.run("processWithdrawFailure", async () => {
      this.access.assertKeeper(caller, "processWithdrawFailure");
      return processWithdrawFailure(this.context(), caller);
    });
  }

  // ─── Owner operations ───────────────────────────────────────────────

  async emergencyRepay(caller: Address): Promise<RequestKey | null> {
    return this.guard.run("emergencyRepay", async () => {
      this.access.assertOwner(caller, "emergencyRepay");
      return emergencyRepay(this.context(), caller);
    });
  }

  async emergencyBorrow(caller: Address): Promise<TokenPair> {
    return this.guard.run("emergencyBorrow", async () => {
      this.access.assertOwner(caller, "emergencyBorrow");
      return emergencyBorrow(this.context(), caller);
    });
  }

  async emergencyResume(caller: Address): Promise<RequestKey | null> {
    return this.guard.run("emergencyResume", async () => {
      this.access.assertOwner(caller, "emergencyResume");
      return emergencyResume(this.context(), caller);
    });
  }

  // ─── Venue callbacks ────────────────────────────────────────────────

  async afterAddLiquidityExecution(key: RequestKey, lpReceived: bigint): Promise<CallbackOutcome> {
    return this.guard.run("afterAddLiquidityExecution", () =>
      routeCallback(this.context(), { key, kind: "add", table: ADD_EXECUTED, args: [lpReceived] }),
    );
  }

  async afterAddLiquidityCancellation(key: RequestKey): Promise<CallbackOutcome> {
    return this.guard.run("afterAddLiquidityCancellation", () =>
      routeCallback(this.context(), { key, kind: "add", table: ADD_CANCELLED, args: [] }),
    );
  }

  async afterRemoveLiquidityExecution(
    key: RequestKey,
    tokenAReceived: bigint,
    tokenBReceived: bigint,
  ): Promise<CallbackOutcome> {
    return this.guard.run("afterRemoveLiquidityExecution", () =>
      routeCallback(this.context(), {
        key,
        kind: "remove",
        table: REMOVE_EXECUTED,
        args: [tokenAReceived, tokenBReceived],
      }),
    );
  }

  async afterRemoveLiquidityCancellation(key: RequestKey): Promise<CallbackOutcome> {
    return this.guard.run("afterRemoveLiquidityCancellation", () =>
      routeCallback(this.context(), { key, kind: "remove", table: REMOVE_CANCELLED, args: [] }),
    );
  }

  // ─── Internal ───────────────────────────────────────────────────────

  protected override clearPendingRequest(): void {
    this.store.pending = null;
  }

  private context(): LpContext {
    return {
      ...this.kernel(),
      config: this.config,
      store: this.store,
      reader: this.reader,
      manager: this.manager,
    };
  }
}
