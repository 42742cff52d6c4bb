/**
 * createMarket — A complete simulated market for one LP vault and one
 * LRT vault.
 *
 * Defaults:
 * - WETH $2,000 (18 dp), USDC $1 (6 dp), ARB $0.50 (18 dp), rsETH $2,500 (18 dp)
 * - WETH/USDC pool: 500 WETH + 1,000,000 USDC, 2,000,000 LP (LP ≈ $1)
 * - Lending: 1,000 WETH and 2,000,000 USDC available
 * - Router inventory large enough for every test flow, no fee
 */

import type { Address, TokenRef } from "@levyield/types";
import { ManualClock } from "./clock.js";
import { InMemoryTokenBank } from "./token-bank.js";
import { StaticPriceOracle } from "./price-oracle.js";
import { SimLendingPool } from "./lending-pool.js";
import { OracleSwapRouter } from "./swap-router.js";
import { SimLiquidityVenue } from "./liquidity-venue.js";

export const WETH: TokenRef = { address: "weth", symbol: "WETH", decimals: 18 };
export const USDC: TokenRef = { address: "usdc", symbol: "USDC", decimals: 6 };
export const WETH_USDC_LP: TokenRef = { address: "weth-usdc-lp", symbol: "WETH-USDC-LP", decimals: 18 };
export const ARB: TokenRef = { address: "arb", symbol: "ARB", decimals: 18 };
export const RSETH: TokenRef = { address: "rseth", symbol: "rsETH", decimals: 18 };

const E18 = 10n ** 18n;
const E6 = 10n ** 6n;

export interface MarketOptions {
  /** Initial unix time. Default: 2026-01-01T00:00:00Z */
  readonly start?: number;

  /** Router fee in basis points. Default: 0 */
  readonly swapFeeBps?: bigint;
}

export interface Market {
  readonly clock: ManualClock;
  readonly bank: InMemoryTokenBank;
  readonly oracle: StaticPriceOracle;
  readonly router: OracleSwapRouter;
  readonly venue: SimLiquidityVenue;
  readonly wethPool: SimLendingPool;
  readonly usdcPool: SimLendingPool;
  readonly tokens: {
    readonly weth: TokenRef;
    readonly usdc: TokenRef;
    readonly lp: TokenRef;
    readonly arb: TokenRef;
    readonly rseth: TokenRef;
  };

  /** Give `holder` freshly minted tokens (NATIVE_TOKEN for the native asset). */
  fund(holder: Address, token: Address, amount: bigint): void;
}

export function createMarket(options: MarketOptions = {}): Market {
  const clock = new ManualClock(options.start);
  const bank = new InMemoryTokenBank(WETH.address);
  const oracle = new StaticPriceOracle(clock);

  oracle.setPrice(WETH.address, 2_000n * 10n ** 8n);
  oracle.setPrice(USDC.address, 10n ** 8n);
  oracle.setPrice(ARB.address, 50_000_000n);
  oracle.setPrice(RSETH.address, 2_500n * 10n ** 8n);

  const router = new OracleSwapRouter(
    bank,
    oracle,
    clock,
    "router",
    [WETH, USDC, ARB, RSETH],
    options.swapFeeBps ?? 0n,
  );
  bank.mint(WETH.address, router.address, 10_000n * E18);
  bank.mint(USDC.address, router.address, 20_000_000n * E6);
  bank.mint(ARB.address, router.address, 1_000_000n * E18);
  bank.mint(RSETH.address, router.address, 10_000n * E18);

  const venue = new SimLiquidityVenue(bank, oracle, {
    address: "venue",
    lpToken: WETH_USDC_LP,
    tokenA: WETH,
    tokenB: USDC,
  });
  venue.seed(500n * E18, 1_000_000n * E6, 2_000_000n * E18, "lp-genesis");

  const wethPool = new SimLendingPool(bank, WETH.address, "lend-weth");
  wethPool.supply(1_000n * E18);
  const usdcPool = new SimLendingPool(bank, USDC.address, "lend-usdc");
  usdcPool.supply(2_000_000n * E6);

  return {
    clock,
    bank,
    oracle,
    router,
    venue,
    wethPool,
    usdcPool,
    tokens: { weth: WETH, usdc: USDC, lp: WETH_USDC_LP, arb: ARB, rseth: RSETH },
    fund(holder, token, amount) {
      bank.mint(token, holder, amount);
    },
  };
}
