/**
 * LRT vault types.
 *
 * The LRT vault borrows the wrapped-native token and holds a liquid
 * restaked token (LRT) bought with it. Every operation settles within
 * the call, so the caches only outlive a call as a record of the last
 * operation.
 */

import type { Address, HealthParams, LendingPool, RebalanceType, TokenRef } from "@levyield/types";
import type { BaseVaultConfig, OperationKernel } from "../base-vault.js";
import type { LrtManager } from "./manager.js";
import type { LrtReader } from "./reader.js";

export interface LrtVaultConfig extends BaseVaultConfig {
  /** Position unit */
  readonly lrt: TokenRef;

  /** Pool lending the wrapped-native token */
  readonly lending: LendingPool;

  readonly rewardToken: TokenRef;

  /** Further deposit tokens; swapped to wrapped native on deposit */
  readonly extraDepositTokens?: readonly TokenRef[];
}

export type LrtDepositTokenKind = "base" | "lrt" | "other";

export interface LrtDepositCache {
  readonly user: Address;
  readonly token: TokenRef;
  readonly tokenKind: LrtDepositTokenKind;
  readonly amount: bigint;
  readonly depositValue: bigint;
  readonly borrowed: bigint;
  readonly lrtBought: bigint;
  readonly minSharesAmt: bigint;
  readonly before: HealthParams;
  readonly after: HealthParams;
  readonly sharesToUser: bigint;
}

export interface LrtWithdrawCache {
  readonly user: Address;
  readonly shareAmt: bigint;
  readonly shareRatio: bigint;
  readonly lrtSold: bigint;
  readonly repaid: bigint;
  readonly assetsOut: bigint;
  readonly before: HealthParams;
  readonly after: HealthParams;
}

export interface LrtRebalanceCache {
  readonly direction: "add" | "remove";
  readonly rebalanceType: RebalanceType;
  readonly borrowed: bigint;
  readonly repaid: bigint;
  readonly lrtDelta: bigint;
  readonly before: HealthParams;
  readonly after: HealthParams;
}

export interface LrtCompoundCache {
  readonly tokenIn: TokenRef;
  readonly tokenOut: TokenRef;
  readonly amountIn: bigint;
  readonly amountOut: bigint;
}

export interface LrtStore {
  lrtAmt: bigint;
  depositCache: LrtDepositCache | null;
  withdrawCache: LrtWithdrawCache | null;
  rebalanceCache: LrtRebalanceCache | null;
  compoundCache: LrtCompoundCache | null;
  emergencyRepaid: bigint;
}

// ─── Parameters ─────────────────────────────────────────────────────────

export interface LrtDepositParams {
  readonly token: Address;
  readonly amount: bigint;
  readonly minSharesAmt: bigint;
  readonly slippage: bigint;
}

export interface LrtWithdrawParams {
  readonly shareAmt: bigint;
  readonly minWithdrawAmt: bigint;
  readonly slippage: bigint;
  /** Pay out native instead of the wrapped-native token */
  readonly unwrap?: boolean;
}

export interface LrtRebalanceAddParams {
  readonly rebalanceType: RebalanceType;
  readonly borrowAmt: bigint;
}

export interface LrtRebalanceRemoveParams {
  readonly rebalanceType: RebalanceType;
  readonly lrtAmtToRemove: bigint;
}

export interface LrtDepositResult {
  readonly shares: bigint;
  readonly depositValue: bigint;
  readonly borrowed: bigint;
  readonly lrtBought: bigint;
}

export interface LrtWithdrawResult {
  readonly assetsOut: bigint;
  readonly repaid: bigint;
  readonly lrtSold: bigint;
}

export interface LrtEmergencyWithdrawResult {
  readonly base: bigint;
  readonly lrt: bigint;
}

export interface LrtContext extends OperationKernel {
  readonly config: LrtVaultConfig;
  readonly store: LrtStore;
  readonly reader: LrtReader;
  readonly manager: LrtManager;
}
