/**
 * Shared fixtures for vault tests: a simulated market with one LP vault
 * and one LRT vault wired to it.
 */

import { InMemoryEventStore } from "@levyield/event-store";
import { ARB, createMarket, RSETH, USDC, WETH, WETH_USDC_LP } from "@levyield/sim";
import type { Market } from "@levyield/sim";
import type { DomainEvent } from "@levyield/types";
import { LpVault } from "../src/lp/lp-vault.js";
import { LrtVault } from "../src/lrt/lrt-vault.js";
import type { VaultParameters } from "../src/parameters.js";

export const E18 = 10n ** 18n;
export const E6 = 10n ** 6n;

export const OWNER = "owner";
export const KEEPER = "keeper";
export const TREASURY = "treasury";
export const ALICE = "alice";
export const BOB = "bob";

export const LP_VAULT = "vault-lp";
export const LRT_VAULT = "vault-lrt";

/** 3x, debt ratio band [0.60, 0.72], delta band ±0.10. */
export function testParams(overrides: Partial<VaultParameters> = {}): VaultParameters {
  return {
    leverage: 3n * E18,
    delta: "Neutral",
    debtRatioStepThreshold: 500n,
    debtRatioUpperLimit: 72n * 10n ** 16n,
    debtRatioLowerLimit: 60n * 10n ** 16n,
    deltaUpperLimit: 10n * 10n ** 16n,
    deltaLowerLimit: -10n * 10n ** 16n,
    minVaultSlippage: 50n,
    swapSlippage: 100n,
    minAssetValue: 10n * E18,
    maxAssetValue: 1_000_000n * E18,
    feePerSecond: 0n,
    swapDeadlineSeconds: 600,
    ...overrides,
  };
}

export interface LpFixture {
  readonly market: Market;
  readonly store: InMemoryEventStore;
  readonly vault: LpVault;
  events(): readonly DomainEvent[];
  eventTypes(): readonly string[];
  lastEvent(type: string): DomainEvent | undefined;
}

export function lpFixture(params: Partial<VaultParameters> = {}): LpFixture {
  const market = createMarket();
  const store = new InMemoryEventStore();
  const vault = new LpVault({
    id: "lp-weth-usdc",
    address: LP_VAULT,
    owner: OWNER,
    keepers: [KEEPER],
    treasury: TREASURY,
    params: testParams(params),
    wrappedNative: WETH,
    oracle: market.oracle,
    swap: market.router,
    bank: market.bank,
    clock: market.clock,
    eventStore: store,
    tokenA: WETH,
    tokenB: USDC,
    lpToken: WETH_USDC_LP,
    rewardToken: ARB,
    lendingA: market.wethPool,
    lendingB: market.usdcPool,
    venue: market.venue,
    extraDepositTokens: [ARB],
  });
  market.venue.registerHandler(vault.address, vault);
  return { market, store, vault, ...eventReaders(store, vault.id) };
}

export interface LrtFixture {
  readonly market: Market;
  readonly store: InMemoryEventStore;
  readonly vault: LrtVault;
  events(): readonly DomainEvent[];
  eventTypes(): readonly string[];
  lastEvent(type: string): DomainEvent | undefined;
}

export function lrtFixture(params: Partial<VaultParameters> = {}): LrtFixture {
  const market = createMarket();
  const store = new InMemoryEventStore();
  const vault = new LrtVault({
    id: "lrt-rseth",
    address: LRT_VAULT,
    owner: OWNER,
    keepers: [KEEPER],
    treasury: TREASURY,
    params: testParams({ delta: "Long", ...params }),
    wrappedNative: WETH,
    oracle: market.oracle,
    swap: market.router,
    bank: market.bank,
    clock: market.clock,
    eventStore: store,
    lrt: RSETH,
    lending: market.wethPool,
    rewardToken: ARB,
    extraDepositTokens: [USDC],
  });
  return { market, store, vault, ...eventReaders(store, vault.id) };
}

function eventReaders(store: InMemoryEventStore, streamId: string) {
  const events = (): readonly DomainEvent[] => store.read(streamId).map((s) => s.event);
  return {
    events,
    eventTypes: (): readonly string[] => events().map((e) => e.type),
    lastEvent: (type: string): DomainEvent | undefined =>
      [...events()].reverse().find((e) => e.type === type),
  };
}

/**
 * Alice deposits 1,000 USDC into a fresh 3x Neutral LP vault and the
 * venue settles it: 3,000 LP, 0.75 WETH + 500 USDC debt, 1,000 shares.
 */
export async function settledLpDeposit(params: Partial<VaultParameters> = {}): Promise<LpFixture> {
  const fx = lpFixture(params);
  fx.market.fund(ALICE, USDC.address, 1_000n * E6);
  const { key } = await fx.vault.deposit(ALICE, {
    token: USDC.address,
    amount: 1_000n * E6,
    minSharesAmt: 0n,
    slippage: 100n,
  });
  await fx.market.venue.execute(key);
  return fx;
}

/**
 * Alice deposits 1 WETH into a fresh 3x LRT vault: 2 WETH borrowed,
 * 2.4 rsETH held, 2,000 shares.
 */
export async function settledLrtDeposit(params: Partial<VaultParameters> = {}): Promise<LrtFixture> {
  const fx = lrtFixture(params);
  fx.market.fund(ALICE, WETH.address, E18);
  await fx.vault.deposit(ALICE, { token: WETH.address, amount: E18, minSharesAmt: 0n, slippage: 100n });
  return fx;
}
