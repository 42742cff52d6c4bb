/**
 * Vault Types
 *
 * Lifecycle and risk vocabulary shared by both vault variants.
 *
 * Rules:
 * - Values and ratios are bigint scaled by 1e18
 * - Delta is signed (negative = short exposure)
 * - Status names match the lifecycle table in DESIGN.md
 */

// =============================================================================
// Lifecycle
// =============================================================================

export const VAULT_STATUSES = [
  "Open",
  "Deposit",
  "Deposit_Failed",
  "Withdraw",
  "Withdraw_Failed",
  "Rebalance_Add",
  "Rebalance_Remove",
  "Rebalance_Open",
  "Compound",
  "Paused",
  "Repay",
  "Repaid",
  "Resume",
  "Closed",
] as const;

/**
 * Lifecycle phase of a vault.
 *
 * `Open` is idle; every other status is either an in-flight operation,
 * a failure awaiting recovery, or part of the emergency sub-machine.
 */
export type VaultStatus = (typeof VAULT_STATUSES)[number];

/** Directional strategy of a vault. */
export type Delta = "Neutral" | "Long" | "Short";

/** Which risk metric a rebalance is correcting. */
export type RebalanceType = "Delta" | "Debt";

// =============================================================================
// Health
// =============================================================================

/**
 * Point-in-time accounting snapshot captured around an operation.
 *
 * `before` is captured once at operation start and never recomputed,
 * so before/after comparisons are made against a consistent snapshot.
 */
export interface HealthParams {
  /** Equity value in USD (1e18) */
  readonly equityValue: bigint;

  /** Debt / asset (1e18) */
  readonly debtRatio: bigint;

  /** Signed delta (1e18) */
  readonly delta: bigint;

  /** Tracked position-unit quantity (LP or LRT amount) */
  readonly positionAmt: bigint;

  /** Equity per share (1e18) */
  readonly svTokenValue: bigint;
}

/**
 * Full set of derived accounting metrics at one instant.
 */
export interface VaultMetrics {
  readonly status: VaultStatus;
  readonly assetValue: bigint;
  readonly debtValue: bigint;
  readonly equityValue: bigint;
  readonly debtRatio: bigint;
  readonly leverage: bigint;
  readonly delta: bigint;
  readonly svTokenValue: bigint;
  readonly pendingFee: bigint;
  readonly totalSupply: bigint;
  readonly positionAmt: bigint;
  readonly additionalCapacity: bigint;
  readonly capacity: bigint;
}
