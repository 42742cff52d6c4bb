/**
 * Devnet — one simulated market with an LP vault and an LRT vault.
 *
 * The HTTP surface drives everything through this object: vault
 * operations, venue settlement (which fires the LP vault's callbacks)
 * and market controls (funding, prices, time).
 */

import { InMemoryEventStore } from "@levyield/event-store";
import type { EventHandler, EventStoreIntegrityResult, Subscription } from "@levyield/event-store";
import { ARB, createMarket, RSETH, USDC, WETH, WETH_USDC_LP } from "@levyield/sim";
import type { Market } from "@levyield/sim";
import type { Address } from "@levyield/types";
import { NATIVE_TOKEN } from "@levyield/types";
import { LpVault, LrtVault } from "@levyield/vault";
import type { BaseVault } from "@levyield/vault";
import type { VaultConfig } from "../config.js";

// =============================================================================
// Types
// =============================================================================

export interface DevnetConfig {
  readonly owner: Address;
  readonly keeper: Address;
  readonly treasury: Address;
  readonly vaults: VaultConfig;
  /** Existing market to build on. Default: a fresh createMarket() */
  readonly market?: Market;
}

export type DevnetVault =
  | { readonly kind: "lp"; readonly vault: LpVault }
  | { readonly kind: "lrt"; readonly vault: LrtVault };

export const LP_VAULT_ID = "lp-weth-usdc";
export const LRT_VAULT_ID = "lrt-rseth";

// =============================================================================
// Devnet
// =============================================================================

export class Devnet {
  readonly market: Market;
  readonly eventStore: InMemoryEventStore;
  readonly lp: LpVault;
  readonly lrt: LrtVault;

  private _ready = false;

  constructor(config: DevnetConfig) {
    this.market = config.market ?? createMarket();
    this.eventStore = new InMemoryEventStore();
    const { market } = this;

    const shared = {
      owner: config.owner,
      keepers: [config.keeper],
      treasury: config.treasury,
      wrappedNative: WETH,
      oracle: market.oracle,
      swap: market.router,
      bank: market.bank,
      clock: market.clock,
      eventStore: this.eventStore,
    };

    this.lp = new LpVault({
      ...shared,
      id: LP_VAULT_ID,
      address: "vault-lp",
      params: config.vaults.lp,
      tokenA: WETH,
      tokenB: USDC,
      lpToken: WETH_USDC_LP,
      rewardToken: ARB,
      lendingA: market.wethPool,
      lendingB: market.usdcPool,
      venue: market.venue,
      extraDepositTokens: [ARB],
    });
    market.venue.registerHandler(this.lp.address, this.lp);

    this.lrt = new LrtVault({
      ...shared,
      id: LRT_VAULT_ID,
      address: "vault-lrt",
      params: config.vaults.lrt,
      lrt: RSETH,
      lending: market.wethPool,
      rewardToken: ARB,
      extraDepositTokens: [USDC],
    });
  }

  // ─── Vaults ─────────────────────────────────────────────────────────

  vault(id: string): DevnetVault | undefined {
    if (id === this.lp.id) return { kind: "lp", vault: this.lp };
    if (id === this.lrt.id) return { kind: "lrt", vault: this.lrt };
    return undefined;
  }

  vaults(): readonly BaseVault[] {
    return [this.lp, this.lrt];
  }

  // ─── Market views ───────────────────────────────────────────────────

  /** Balances of every market token and the native asset. */
  async balances(holder: Address): Promise<Record<string, bigint>> {
    const out: Record<string, bigint> = {};
    for (const token of Object.values(this.market.tokens)) {
      out[token.address] = await this.market.bank.balanceOf(token.address, holder);
    }
    out[NATIVE_TOKEN] = await this.market.bank.balanceOf(NATIVE_TOKEN, holder);
    return out;
  }

  // ─── Events ─────────────────────────────────────────────────────────

  subscribe(handler: EventHandler): Subscription {
    return this.eventStore.subscribeAll(handler);
  }

  checkEventStore(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /** Startup self-check: the event chain must verify. */
  initialize(): void {
    this._ready = this.checkEventStore().valid;
  }

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }
}
