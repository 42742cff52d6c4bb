/**
 * LrtVault — leveraged liquid-restaking position (Long only).
 *
 * Swaps settle inside the call, so there is no pending request and no
 * callback surface; a failed after-check unwinds and throws.
 */

import type { Address, HealthParams, VaultMetrics } from "@levyield/types";
import { BaseVault } from "../base-vault.js";
import type { CompoundParams } from "../lp/types.js";
import { compound, compoundPositionUnit } from "./compound.js";
import { deposit } from "./deposit.js";
import { emergencyBorrow, emergencyRepay, emergencyResume, emergencyWithdraw } from "./emergency.js";
import { LrtManager } from "./manager.js";
import { LrtReader } from "./reader.js";
import { rebalanceAdd, rebalanceRemove } from "./rebalance.js";
import type { LrtRebalanceResult } from "./rebalance.js";
import type {
  LrtContext,
  LrtDepositParams,
  LrtDepositResult,
  LrtEmergencyWithdrawResult,
  LrtRebalanceAddParams,
  LrtRebalanceRemoveParams,
  LrtStore,
  LrtVaultConfig,
  LrtWithdrawParams,
  LrtWithdrawResult,
} from "./types.js";
import { withdraw } from "./withdraw.js";

export class LrtVault extends BaseVault {
  readonly reader: LrtReader;

  private readonly config: LrtVaultConfig;
  private readonly store: LrtStore = {
    lrtAmt: 0n,
    depositCache: null,
    withdrawCache: null,
    rebalanceCache: null,
    compoundCache: null,
    emergencyRepaid: 0n,
  };
  private readonly manager: LrtManager;

  constructor(config: LrtVaultConfig) {
    super(config, ["Long"]);
    this.config = config;
    const kernel = this.kernel();
    this.reader = new LrtReader(kernel, config, this.store);
    this.manager = new LrtManager(kernel, config, this.reader);
  }

  get lrtAmt(): bigint {
    return this.store.lrtAmt;
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

  async deposit(user: Address, params: LrtDepositParams): Promise<LrtDepositResult> {
    return this.guard.run("deposit", () => deposit(this.context(), user, params, false));
  }

  async depositNative(user: Address, params: Omit<LrtDepositParams, "token">): Promise<LrtDepositResult> {
    return this.guard.run("depositNative", () =>
      deposit(this.context(), user, { ...params, token: this.wrappedNative.address }, true),
    );
  }

  async withdraw(user: Address, params: LrtWithdrawParams): Promise<LrtWithdrawResult> {
    return this.guard.run("withdraw", () => withdraw(this.context(), user, params));
  }

  async emergencyWithdraw(user: Address, shareAmt: bigint): Promise<LrtEmergencyWithdrawResult> {
    return this.guard.run("emergencyWithdraw", () => emergencyWithdraw(this.context(), user, shareAmt));
  }

  // ─── Keeper operations ──────────────────────────────────────────────

  async rebalanceAdd(caller: Address, params: LrtRebalanceAddParams): Promise<LrtRebalanceResult> {
    return this.guard.run("rebalanceAdd", async () => {
      this.access.assertKeeper(caller, "rebalanceAdd");
      return rebalanceAdd(this.context(), caller, params);
    });
  }

  async rebalanceRemove(caller: Address, params: LrtRebalanceRemoveParams): Promise<LrtRebalanceResult> {
    return this.guard.run("rebalanceRemove", async () => {
      this.access.assertKeeper(caller, "rebalanceRemove");
      return rebalanceRemove(this.context(), caller, params);
    });
  }

  async compound(caller: Address, params: CompoundParams): Promise<bigint> {
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

  // ─── Owner operations ───────────────────────────────────────────────

  async emergencyRepay(caller: Address): Promise<bigint> {
    return this.guard.run("emergencyRepay", async () => {
      this.access.assertOwner(caller, "emergencyRepay");
      return emergencyRepay(this.context(), caller);
    });
  }

  async emergencyBorrow(caller: Address): Promise<bigint> {
    return this.guard.run("emergencyBorrow", async () => {
      this.access.assertOwner(caller, "emergencyBorrow");
      return emergencyBorrow(this.context(), caller);
    });
  }

  async emergencyResume(caller: Address): Promise<bigint> {
    return this.guard.run("emergencyResume", async () => {
      this.access.assertOwner(caller, "emergencyResume");
      return emergencyResume(this.context(), caller);
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /** Nothing is ever pending. */
  protected override clearPendingRequest(): void {}

  private context(): LrtContext {
    return {
      ...this.kernel(),
      config: this.config,
      store: this.store,
      reader: this.reader,
      manager: this.manager,
    };
  }
}
