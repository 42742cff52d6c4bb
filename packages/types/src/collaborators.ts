/**
 * Collaborator Contracts
 *
 * The interfaces the vault core needs from the outside world.
 * Implementations live elsewhere (@levyield/sim for tests and devnet,
 * chain adapters in production); the core owns none of their internals.
 *
 * Rules:
 * - Every call is async (collaborators are remote in production)
 * - Failures throw; the core never swallows them
 * - Amounts are raw token units, prices are 1e18-scaled USD
 */

import type { Address, RequestKey } from "./chain.js";

// =============================================================================
// Oracle
// =============================================================================

export interface OracleQuote {
  /** Raw feed answer */
  readonly price: bigint;

  /** Decimals of `price` */
  readonly decimals: number;
}

/**
 * USD price feed.
 *
 * Implementations throw on missing, stale, or broken feeds.
 */
export interface PriceOracle {
  consult(token: Address): Promise<OracleQuote>;
  consultIn18Decimals(token: Address): Promise<bigint>;
}

// =============================================================================
// Swap Gateway
// =============================================================================

export interface SwapExactInParams {
  /** Account whose tokens are spent and who receives the output */
  readonly payer: Address;
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly amountIn: bigint;
  readonly minAmountOut: bigint;
  /** Unix seconds after which the swap must fail */
  readonly deadline: number;
}

export interface SwapExactOutParams {
  readonly payer: Address;
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly amountOut: bigint;
  readonly maxAmountIn: bigint;
  readonly deadline: number;
}

/**
 * Swap execution against an external venue.
 *
 * Both calls enforce the caller's slippage bound and leave any unused
 * input with the payer.
 */
export interface SwapGateway {
  /** @returns amount of tokenOut received */
  swapExactIn(params: SwapExactInParams): Promise<bigint>;

  /** @returns amount of tokenIn spent */
  swapExactOut(params: SwapExactOutParams): Promise<bigint>;
}

// =============================================================================
// Lending Pool
// =============================================================================

/**
 * A single-asset lending pool the vault borrows from.
 *
 * `maxRepay` is the borrower's full outstanding debt including accrued
 * interest; debt ratio is computed from it.
 */
export interface LendingPool {
  readonly asset: Address;
  borrow(borrower: Address, amount: bigint): Promise<void>;
  repay(borrower: Address, amount: bigint): Promise<void>;
  maxRepay(borrower: Address): Promise<bigint>;
  totalAvailableAsset(): Promise<bigint>;
}

// =============================================================================
// Token Bank
// =============================================================================

/**
 * Custody ledger for fungible tokens and the native asset.
 */
export interface TokenBank {
  balanceOf(token: Address, holder: Address): Promise<bigint>;
  transfer(token: Address, from: Address, to: Address, amount: bigint): Promise<void>;

  /** Convert `holder`'s native balance into the wrapped-native token */
  wrapNative(holder: Address, amount: bigint): Promise<void>;

  /** Convert `holder`'s wrapped-native balance back into native */
  unwrapNative(holder: Address, amount: bigint): Promise<void>;

  /** Send native asset; throws if the recipient rejects it */
  sendNative(from: Address, to: Address, amount: bigint): Promise<void>;
}

// =============================================================================
// Liquidity Venue (asynchronous settlement)
// =============================================================================

/**
 * Reserves of a two-token pool and its LP supply.
 */
export interface PoolState {
  readonly reserveA: bigint;
  readonly reserveB: bigint;
  readonly lpSupply: bigint;
}

export interface AddLiquidityRequest {
  readonly owner: Address;
  readonly tokenAAmt: bigint;
  readonly tokenBAmt: bigint;
  readonly minLpOut: bigint;
}

export interface RemoveLiquidityRequest {
  readonly owner: Address;
  readonly lpAmt: bigint;
  readonly minTokenAOut: bigint;
  readonly minTokenBOut: bigint;
}

/**
 * A pool that settles liquidity changes in a later transaction.
 *
 * A request escrows the owner's tokens and returns a key; settlement or
 * cancellation is later delivered to the owner's LiquidityCallbackHandler
 * carrying that key.
 */
export interface LiquidityVenue {
  readonly lpToken: Address;
  readonly tokenA: Address;
  readonly tokenB: Address;
  poolState(): Promise<PoolState>;
  requestAddLiquidity(request: AddLiquidityRequest): Promise<RequestKey>;
  requestRemoveLiquidity(request: RemoveLiquidityRequest): Promise<RequestKey>;
}

// =============================================================================
// Callbacks
// =============================================================================

/**
 * Result of routing a venue callback into the vault.
 */
export type CallbackOutcome =
  | {
      readonly handled: true;
      /** Name of the continuation that ran (e.g., "processDeposit") */
      readonly route: string;
    }
  | {
      readonly handled: false;
      readonly reason: "UNMATCHED_KEY" | "UNMATCHED_STATUS" | "NO_PENDING_REQUEST";
    };

/**
 * Receiver of venue settlement notifications.
 */
export interface LiquidityCallbackHandler {
  afterAddLiquidityExecution(key: RequestKey, lpReceived: bigint): Promise<CallbackOutcome>;
  afterAddLiquidityCancellation(key: RequestKey): Promise<CallbackOutcome>;
  afterRemoveLiquidityExecution(
    key: RequestKey,
    tokenAReceived: bigint,
    tokenBReceived: bigint,
  ): Promise<CallbackOutcome>;
  afterRemoveLiquidityCancellation(key: RequestKey): Promise<CallbackOutcome>;
}
