/**
 * LP vault types — configuration, store and operation caches.
 *
 * The LP vault holds LP tokens of a two-token pool (tokenA volatile,
 * tokenB stable) whose adds and removes settle asynchronously.
 */

import type {
  Address,
  HealthParams,
  LendingPool,
  LiquidityVenue,
  RebalanceType,
  RequestKey,
  TokenRef,
} from "@levyield/types";
import type { BaseVaultConfig, OperationKernel } from "../base-vault.js";
import type { LpManager } from "./manager.js";
import type { LpReader } from "./reader.js";

// =============================================================================
// Configuration
// =============================================================================

export interface LpVaultConfig extends BaseVaultConfig {
  readonly tokenA: TokenRef;
  readonly tokenB: TokenRef;
  readonly lpToken: TokenRef;
  readonly rewardToken: TokenRef;
  readonly lendingA: LendingPool;
  readonly lendingB: LendingPool;
  readonly venue: LiquidityVenue;

  /** Further deposit tokens; swapped to tokenB on deposit */
  readonly extraDepositTokens?: readonly TokenRef[];
}

// =============================================================================
// Amounts
// =============================================================================

export interface TokenPair {
  readonly tokenA: bigint;
  readonly tokenB: bigint;
}

export const ZERO_PAIR: TokenPair = { tokenA: 0n, tokenB: 0n };

// =============================================================================
// Pending request
// =============================================================================

/**
 * The one venue request the vault is waiting on. Callbacks are matched
 * against this key and kind before anything runs.
 */
export interface PendingRequest {
  readonly key: RequestKey;
  readonly kind: "add" | "remove";
}

// =============================================================================
// Operation caches
// =============================================================================

export type DepositTokenKind = "tokenA" | "tokenB" | "lp" | "other";

export interface DepositCache {
  readonly user: Address;
  readonly token: TokenRef;
  readonly tokenKind: DepositTokenKind;
  readonly amount: bigint;
  readonly native: boolean;
  readonly depositValue: bigint;
  readonly depositedLp: bigint;
  /** tokenB received for an `other` deposit token */
  readonly swappedToTokenB: bigint;
  readonly borrowed: TokenPair;
  readonly minSharesAmt: bigint;
  readonly slippage: bigint;
  readonly before: HealthParams;
  lpReceived: bigint;
  after: HealthParams | null;
}

export interface WithdrawCache {
  readonly user: Address;
  readonly token: TokenRef;
  readonly shareAmt: bigint;
  readonly shareRatio: bigint;
  readonly lpAmt: bigint;
  readonly withdrawValue: bigint;
  readonly minWithdrawAmt: bigint;
  readonly slippage: bigint;
  readonly unwrap: boolean;
  readonly before: HealthParams;
  after: HealthParams | null;
  repaid: TokenPair;
  assetsOut: bigint;
  reborrowed: TokenPair;
}

export interface RebalanceCache {
  readonly direction: "add" | "remove";
  readonly rebalanceType: RebalanceType;
  readonly borrowed: TokenPair;
  readonly lpAmtToRemove: bigint;
  readonly before: HealthParams;
  after: HealthParams | null;
}

export interface CompoundCache {
  readonly tokenIn: TokenRef;
  readonly tokenOut: TokenRef;
  readonly amountIn: bigint;
  readonly amountOut: bigint;
  readonly added: TokenPair;
  readonly before: HealthParams;
}

// =============================================================================
// Store
// =============================================================================

export interface LpStore {
  /** LP held on the vault's account */
  lpAmt: bigint;
  pending: PendingRequest | null;
  depositCache: DepositCache | null;
  withdrawCache: WithdrawCache | null;
  rebalanceCache: RebalanceCache | null;
  compoundCache: CompoundCache | null;
  /** Debt cleared by emergencyRepay, re-borrowed by emergencyBorrow */
  emergencyRepaid: TokenPair;
}

// =============================================================================
// Operation parameters
// =============================================================================

export interface LpDepositParams {
  readonly token: Address;
  readonly amount: bigint;
  readonly minSharesAmt: bigint;
  /** bps, at least minVaultSlippage */
  readonly slippage: bigint;
}

export interface LpWithdrawParams {
  /** tokenA or tokenB */
  readonly token: Address;
  readonly shareAmt: bigint;
  readonly minWithdrawAmt: bigint;
  readonly slippage: bigint;
  /** Pay out native instead of the wrapped-native token */
  readonly unwrap?: boolean;
}

export interface LpRebalanceAddParams {
  readonly rebalanceType: RebalanceType;
  readonly borrowTokenAAmt: bigint;
  readonly borrowTokenBAmt: bigint;
}

export interface LpRebalanceRemoveParams {
  readonly rebalanceType: RebalanceType;
  readonly lpAmtToRemove: bigint;
}

export interface CompoundParams {
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly amountIn: bigint;
}

export interface DepositRequestResult {
  readonly key: RequestKey;
  readonly depositValue: bigint;
  readonly borrowed: TokenPair;
  readonly minSharesAmt: bigint;
}

export interface WithdrawRequestResult {
  readonly key: RequestKey;
  readonly shareRatio: bigint;
  readonly lpAmt: bigint;
  readonly withdrawValue: bigint;
}

// =============================================================================
// Context
// =============================================================================

/**
 * Everything an LP operation module needs.
 */
export interface LpContext extends OperationKernel {
  readonly config: LpVaultConfig;
  readonly store: LpStore;
  readonly reader: LpReader;
  readonly manager: LpManager;
}
