/**
 * @levyield/sim — In-process collaborators for Levyield vaults.
 *
 * Everything a vault talks to, running in memory:
 * - InMemoryTokenBank (custody, native asset, wrapping)
 * - StaticPriceOracle (settable feeds with staleness)
 * - SimLendingPool (borrow / repay / maxRepay)
 * - OracleSwapRouter (oracle-priced swaps with slippage bounds)
 * - SimLiquidityVenue (two-phase add / remove liquidity)
 * - createMarket() wiring all of them together
 *
 * @packageDocumentation
 */

export { SimError } from "./errors.js";
export type { SimErrorCode } from "./errors.js";

export { ManualClock } from "./clock.js";
export { InMemoryTokenBank } from "./token-bank.js";
export { StaticPriceOracle } from "./price-oracle.js";
export type { StaticPriceOracleOptions } from "./price-oracle.js";
export { SimLendingPool } from "./lending-pool.js";
export { OracleSwapRouter } from "./swap-router.js";
export { SimLiquidityVenue } from "./liquidity-venue.js";
export type {
  PendingLiquidityRequest,
  Settlement,
  SettlementOptions,
  SimLiquidityVenueConfig,
} from "./liquidity-venue.js";

export { createMarket, WETH, USDC, WETH_USDC_LP, ARB, RSETH } from "./market.js";
export type { Market, MarketOptions } from "./market.js";
