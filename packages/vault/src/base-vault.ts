/**
 * BaseVault — what both vault variants share.
 *
 * Composes:
 * - ShareLedger (vault shares)
 * - AccessControl (owner / keepers)
 * - ReentrancyGuard (one mutating call at a time)
 * - VaultEventLog (domain events, one stream per vault)
 * - OracleAdapter + TradeManager (pricing, swaps, lending)
 *
 * and implements the operations whose behaviour does not depend on
 * the position unit: fee collection, status bookkeeping, payouts,
 * pause / close / manual status override and parameter updates.
 */

import type { EventStore } from "@levyield/event-store";
import type {
  Address,
  Clock,
  Delta,
  HealthParams,
  PriceOracle,
  SwapGateway,
  TokenBank,
  TokenRef,
  VaultMetrics,
  VaultStatus,
} from "@levyield/types";
import { AccessControl } from "./access.js";
import { assertStatus } from "./checks.js";
import { VaultError } from "./errors.js";
import { VaultEventLog } from "./events.js";
import type { EventContext, EventValue, VaultEventType } from "./events.js";
import { pendingFee, svTokenValue, valueToShares } from "./fees.js";
import { OracleAdapter } from "./oracle-adapter.js";
import { validateParameters } from "./parameters.js";
import type { VaultParameters } from "./parameters.js";
import { ReentrancyGuard } from "./reentrancy.js";
import { ShareLedger } from "./share-ledger.js";
import { TradeManager } from "./trade.js";

// =============================================================================
// Types
// =============================================================================

export interface BaseVaultConfig {
  /** Vault id; also the event stream id */
  readonly id: string;

  /** Custody address of the vault in the token bank */
  readonly address: Address;

  readonly owner: Address;
  readonly keepers: readonly Address[];
  readonly treasury: Address;
  readonly params: VaultParameters;

  /** Wrapped form of the native asset (deposits / payouts in native) */
  readonly wrappedNative: TokenRef;

  readonly oracle: PriceOracle;
  readonly swap: SwapGateway;
  readonly bank: TokenBank;
  readonly clock: Clock;
  readonly eventStore: EventStore;
}

/**
 * State every vault persists regardless of variant.
 */
export interface KernelState {
  status: VaultStatus;

  /** An emergency pause arrived while an operation was in flight */
  pauseRequested: boolean;

  params: VaultParameters;

  /** Unix seconds of the last fee collection */
  lastFeeCollected: number;

  treasury: Address;
}

export type PayoutForm = "token" | "native" | "wrapped";

/**
 * The slice of a vault that operation modules work through.
 */
export interface OperationKernel {
  readonly address: Address;
  readonly state: KernelState;
  readonly shares: ShareLedger;
  readonly oracle: OracleAdapter;
  readonly trade: TradeManager;
  readonly bank: TokenBank;
  readonly events: VaultEventLog;
  readonly wrappedNative: TokenRef;
  collectFee(ctx: EventContext): bigint;
  setStatus(next: VaultStatus, ctx: EventContext): void;
  returnToOpen(ctx: EventContext): void;
  emit(type: VaultEventType, ctx: EventContext, payload?: Readonly<Record<string, EventValue>>): void;
  payout(to: Address, token: TokenRef, amount: bigint, unwrap: boolean): Promise<PayoutForm>;
  valueToShares(value: bigint, currentEquity: bigint): bigint;
  supplyWithFee(): bigint;
}

/** Statuses in which a pause is queued instead of applied. */
const PAUSE_DEFERRED: readonly VaultStatus[] = [
  "Deposit",
  "Deposit_Failed",
  "Withdraw",
  "Withdraw_Failed",
  "Rebalance_Add",
  "Rebalance_Remove",
  "Compound",
];

const FEE_PAUSED: readonly VaultStatus[] = ["Paused", "Closed"];

// =============================================================================
// BaseVault
// =============================================================================

export abstract class BaseVault {
  readonly id: string;
  readonly address: Address;

  protected readonly state: KernelState;
  protected readonly shares = new ShareLedger();
  protected readonly access: AccessControl;
  protected readonly guard = new ReentrancyGuard();
  protected readonly events: VaultEventLog;
  protected readonly oracle: OracleAdapter;
  protected readonly trade: TradeManager;
  protected readonly bank: TokenBank;
  protected readonly clock: Clock;
  protected readonly wrappedNative: TokenRef;

  constructor(
    config: BaseVaultConfig,
    private readonly allowedDeltas: readonly Delta[],
  ) {
    validateParameters(config.params, allowedDeltas);

    this.id = config.id;
    this.address = config.address;
    this.bank = config.bank;
    this.clock = config.clock;
    this.wrappedNative = config.wrappedNative;
    this.access = new AccessControl(config.owner, config.keepers);
    this.events = new VaultEventLog(config.eventStore, config.id, config.clock);
    this.oracle = new OracleAdapter(config.oracle);
    this.state = {
      status: "Open",
      pauseRequested: false,
      params: config.params,
      lastFeeCollected: config.clock.now(),
      treasury: config.treasury,
    };
    this.trade = new TradeManager({
      address: config.address,
      swap: config.swap,
      oracle: this.oracle,
      clock: config.clock,
      deadlineSeconds: () => this.state.params.swapDeadlineSeconds,
    });
  }

  // ─── Variant hooks ──────────────────────────────────────────────────

  abstract equityValue(): Promise<bigint>;
  abstract health(): Promise<HealthParams>;
  abstract metrics(): Promise<VaultMetrics>;

  /** Forget any stored venue request key. */
  protected abstract clearPendingRequest(): void;

  protected kernel(): OperationKernel {
    return {
      address: this.address,
      state: this.state,
      shares: this.shares,
      oracle: this.oracle,
      trade: this.trade,
      bank: this.bank,
      events: this.events,
      wrappedNative: this.wrappedNative,
      collectFee: (ctx) => this.collectFee(ctx),
      setStatus: (next, ctx) => this.setStatus(next, ctx),
      returnToOpen: (ctx) => this.returnToOpen(ctx),
      emit: (type, ctx, payload) => this.emit(type, ctx, payload),
      payout: (to, token, amount, unwrap) => this.payout(to, token, amount, unwrap),
      valueToShares: (value, equity) => this.valueToShares(value, equity),
      supplyWithFee: () => this.supplyWithFee(),
    };
  }

  // ─── Views ──────────────────────────────────────────────────────────

  get status(): VaultStatus {
    return this.state.status;
  }

  get params(): VaultParameters {
    return this.state.params;
  }

  get treasury(): Address {
    return this.state.treasury;
  }

  get owner(): Address {
    return this.access.owner;
  }

  get pauseRequested(): boolean {
    return this.state.pauseRequested;
  }

  keepers(): readonly Address[] {
    return this.access.keeperList();
  }

  balanceOf(holder: Address): bigint {
    return this.shares.balanceOf(holder);
  }

  totalSupply(): bigint {
    return this.shares.totalSupply();
  }

  pendingFee(): bigint {
    return pendingFee(
      this.shares.totalSupply(),
      this.state.params.feePerSecond,
      this.clock.now() - this.state.lastFeeCollected,
    );
  }

  /** Equity per share; throws before the first deposit. */
  async svTokenValue(): Promise<bigint> {
    return svTokenValue(await this.equityValue(), this.supplyWithFee());
  }

  valueToShares(value: bigint, currentEquity: bigint): bigint {
    return valueToShares(value, currentEquity, this.supplyWithFee());
  }

  protected supplyWithFee(): bigint {
    return this.shares.totalSupply() + this.pendingFee();
  }

  /** svTokenValue, or 0 while there are no shares. */
  protected svTokenValueOrZero(equity: bigint): bigint {
    const supply = this.supplyWithFee();
    return supply === 0n ? 0n : svTokenValue(equity, supply);
  }

  // ─── Fees ───────────────────────────────────────────────────────────

  /**
   * Mint the accrued management fee to the treasury.
   */
  async mintFee(caller: Address): Promise<bigint> {
    return this.guard.run("mintFee", async () => {
      this.access.assertKeeper(caller, "mintFee");
      if (FEE_PAUSED.includes(this.state.status)) {
        throw new VaultError(
          "FEE_COLLECTION_PAUSED",
          `Fees are not collected while the vault is ${this.state.status}`,
        );
      }
      return this.collectFee({ actor: caller, correlationId: this.events.nextLocalId("fee") });
    });
  }

  /**
   * Mint the accrued fee without the status guard. Deposit and withdraw
   * call this once their checks have passed; share arithmetic before that
   * point goes through supplyWithFee.
   */
  protected collectFee(ctx: EventContext): bigint {
    const fee = this.pendingFee();
    this.state.lastFeeCollected = this.clock.now();
    if (fee > 0n) {
      this.shares.mint(this.state.treasury, fee);
      this.emit("fee.minted", ctx, { shares: fee, treasury: this.state.treasury });
    }
    return fee;
  }

  // ─── Status ─────────────────────────────────────────────────────────

  protected setStatus(next: VaultStatus, ctx: EventContext): void {
    const previous = this.state.status;
    if (previous === next) return;
    this.state.status = next;
    this.emit("status.changed", ctx, { from: previous, to: next });
  }

  /**
   * Finish an operation. A pause queued while it was in flight is
   * applied here instead of opening.
   */
  protected returnToOpen(ctx: EventContext): void {
    if (!this.state.pauseRequested) {
      this.setStatus("Open", ctx);
      return;
    }
    this.state.pauseRequested = false;
    this.collectFee(ctx);
    this.setStatus("Paused", ctx);
    this.emit("emergency.paused", ctx, { deferred: true });
  }

  protected emit(
    type: VaultEventType,
    ctx: EventContext,
    payload: Readonly<Record<string, EventValue>> = {},
  ): void {
    this.events.emit(type, ctx, payload);
  }

  // ─── Payouts ────────────────────────────────────────────────────────

  /**
   * Send `amount` of `token` from custody. With `unwrap` and the
   * wrapped-native token, native is sent; a recipient that refuses
   * native receives the wrapped token instead.
   */
  protected async payout(
    to: Address,
    token: TokenRef,
    amount: bigint,
    unwrap: boolean,
  ): Promise<PayoutForm> {
    if (!unwrap || token.address !== this.wrappedNative.address) {
      await this.bank.transfer(token.address, this.address, to, amount);
      return "token";
    }
    if (amount === 0n) return "native";

    await this.bank.unwrapNative(this.address, amount);
    try {
      await this.bank.sendNative(this.address, to, amount);
      return "native";
    } catch (err) {
      this.emit(
        "payout.native_fallback",
        { actor: to, correlationId: this.events.nextLocalId("payout") },
        { token: token.symbol, amount, reason: err instanceof Error ? err.message : String(err) },
      );
      await this.bank.wrapNative(this.address, amount);
      await this.bank.transfer(this.wrappedNative.address, this.address, to, amount);
      return "wrapped";
    }
  }

  // ─── Emergency (variant-independent steps) ──────────────────────────

  /**
   * Pause now when idle; queue the pause when an operation is in flight.
   */
  async emergencyPause(caller: Address): Promise<VaultStatus> {
    return this.guard.run("emergencyPause", async () => {
      this.access.assertKeeper(caller, "emergencyPause");
      const ctx = { actor: caller, correlationId: this.events.nextLocalId("pause") };

      if (PAUSE_DEFERRED.includes(this.state.status)) {
        this.state.pauseRequested = true;
        this.emit("emergency.pause_requested", ctx, { during: this.state.status });
        return this.state.status;
      }

      assertStatus(this.state.status, ["Open", "Rebalance_Open"], "emergencyPause");
      this.collectFee(ctx);
      this.setStatus("Paused", ctx);
      this.emit("emergency.paused", ctx, { deferred: false });
      return this.state.status;
    });
  }

  async emergencyClose(caller: Address): Promise<void> {
    await this.guard.run("emergencyClose", async () => {
      this.access.assertOwner(caller, "emergencyClose");
      assertStatus(this.state.status, ["Repaid"], "emergencyClose");
      const ctx = { actor: caller, correlationId: this.events.nextLocalId("close") };
      this.setStatus("Closed", ctx);
      this.emit("emergency.closed", ctx);
    });
  }

  /**
   * Force the status. Any stored request key is dropped, so callbacks
   * for the abandoned request are rejected.
   */
  async emergencyStatusChange(caller: Address, status: VaultStatus): Promise<void> {
    await this.guard.run("emergencyStatusChange", async () => {
      this.access.assertOwner(caller, "emergencyStatusChange");
      this.clearPendingRequest();
      this.setStatus(status, { actor: caller, correlationId: this.events.nextLocalId("status") });
    });
  }

  /** Rebalance_Open → Open. */
  async rebalanceClose(caller: Address): Promise<void> {
    await this.guard.run("rebalanceClose", async () => {
      this.access.assertOwner(caller, "rebalanceClose");
      assertStatus(this.state.status, ["Rebalance_Open"], "rebalanceClose");
      const ctx = { actor: caller, correlationId: this.events.nextLocalId("rebalance") };
      this.emit("rebalance.closed", ctx);
      this.returnToOpen(ctx);
    });
  }

  // ─── Administration ─────────────────────────────────────────────────

  async updateParameters(caller: Address, params: VaultParameters): Promise<void> {
    await this.guard.run("updateParameters", async () => {
      this.access.assertOwner(caller, "updateParameters");
      validateParameters(params, this.allowedDeltas);
      const ctx = { actor: caller, correlationId: this.events.nextLocalId("params") };
      if (!FEE_PAUSED.includes(this.state.status)) {
        this.collectFee(ctx);
      }
      this.state.params = params;
      this.emit("parameters.updated", ctx, {
        leverage: params.leverage,
        delta: params.delta,
        feePerSecond: params.feePerSecond,
      });
    });
  }

  async updateKeeper(caller: Address, keeper: Address, approved: boolean): Promise<void> {
    await this.guard.run("updateKeeper", async () => {
      this.access.assertOwner(caller, "updateKeeper");
      this.access.setKeeper(keeper, approved);
      this.emit(
        "keeper.updated",
        { actor: caller, correlationId: this.events.nextLocalId("keeper") },
        { keeper, approved },
      );
    });
  }

  async updateTreasury(caller: Address, treasury: Address): Promise<void> {
    await this.guard.run("updateTreasury", async () => {
      this.access.assertOwner(caller, "updateTreasury");
      const ctx = { actor: caller, correlationId: this.events.nextLocalId("treasury") };
      if (!FEE_PAUSED.includes(this.state.status)) {
        this.collectFee(ctx);
      }
      this.state.treasury = treasury;
      this.emit("treasury.updated", ctx, { treasury });
    });
  }
}
