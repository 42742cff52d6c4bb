/**
 * Checks — the guard layer shared by both vault variants.
 *
 * Two shapes:
 * - before* checks throw VaultError and run before anything is mutated
 * - after* checks return a CheckResult; the asynchronous variant turns a
 *   failure into a *_Failed status, the synchronous one unwinds and throws
 */

import { absDiff, BPS_DENOMINATOR, mulDiv } from "@levyield/math";
import type { HealthParams, RebalanceType, VaultStatus } from "@levyield/types";
import { VaultError } from "./errors.js";
import type { VaultErrorCode } from "./errors.js";
import type { VaultParameters } from "./parameters.js";

// =============================================================================
// Result
// =============================================================================

export type CheckResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: VaultError };

const PASS: CheckResult = { ok: true };

function failure(
  code: VaultErrorCode,
  message: string,
  details?: Readonly<Record<string, string>>,
): CheckResult {
  return { ok: false, error: new VaultError(code, message, details) };
}

/** The first failing result, or a pass. */
export function firstFailure(...results: readonly CheckResult[]): CheckResult {
  return results.find((r) => !r.ok) ?? PASS;
}

// =============================================================================
// Primitives
// =============================================================================

export function assertStatus(
  status: VaultStatus,
  allowed: readonly VaultStatus[],
  operation: string,
): void {
  if (!allowed.includes(status)) {
    throw new VaultError(
      "INVALID_STATUS",
      `${operation} is not allowed while the vault is ${status}`,
      { status, operation },
    );
  }
}

/**
 * |after − before| ≤ before × thresholdBps / 10000, always true when
 * `before` is zero.
 */
export function isWithinStepChange(before: bigint, after: bigint, thresholdBps: bigint): boolean {
  if (before === 0n) return true;
  return absDiff(after, before) <= mulDiv(before, thresholdBps, BPS_DENOMINATOR);
}

function assertSlippage(slippage: bigint, params: VaultParameters): void {
  if (slippage < params.minVaultSlippage || slippage > BPS_DENOMINATOR) {
    throw new VaultError(
      "SLIPPAGE_BELOW_MINIMUM",
      `Slippage ${slippage} bps must be in [${params.minVaultSlippage}, ${BPS_DENOMINATOR}]`,
    );
  }
}

// =============================================================================
// Deposit
// =============================================================================

export interface DepositCheckInput {
  readonly status: VaultStatus;
  readonly amount: bigint;
  readonly slippage: bigint;
  readonly depositValue: bigint;
  readonly additionalCapacity: bigint;
  readonly params: VaultParameters;
}

export function beforeDepositChecks(input: DepositCheckInput): void {
  assertStatus(input.status, ["Open"], "deposit");
  if (input.amount <= 0n) {
    throw new VaultError("EMPTY_DEPOSIT_AMOUNT", "Deposit amount must be positive");
  }
  assertSlippage(input.slippage, input.params);
  if (input.depositValue < input.params.minAssetValue) {
    throw new VaultError(
      "INSUFFICIENT_DEPOSIT_VALUE",
      `Deposit value ${input.depositValue} is below the minimum ${input.params.minAssetValue}`,
    );
  }
  if (input.depositValue > input.params.maxAssetValue) {
    throw new VaultError(
      "EXCESSIVE_DEPOSIT_VALUE",
      `Deposit value ${input.depositValue} exceeds the maximum ${input.params.maxAssetValue}`,
    );
  }
  if (input.depositValue > input.additionalCapacity) {
    throw new VaultError(
      "INSUFFICIENT_CAPACITY",
      `Deposit value ${input.depositValue} exceeds remaining capacity ${input.additionalCapacity}`,
    );
  }
}

export interface AfterDepositInput {
  readonly before: HealthParams;
  readonly after: HealthParams;
  readonly sharesToUser: bigint;
  readonly minSharesAmt: bigint;
  readonly params: VaultParameters;
}

export function afterDepositChecks(input: AfterDepositInput): CheckResult {
  const { before, after } = input;
  return firstFailure(
    after.positionAmt > before.positionAmt
      ? PASS
      : failure("POSITION_NOT_INCREASED", "Position did not increase", {
          before: before.positionAmt.toString(),
          after: after.positionAmt.toString(),
        }),
    isWithinStepChange(before.debtRatio, after.debtRatio, input.params.debtRatioStepThreshold)
      ? PASS
      : failure("EXCEEDS_STEP_CHANGE", "Debt ratio moved beyond the step threshold", {
          before: before.debtRatio.toString(),
          after: after.debtRatio.toString(),
        }),
    input.sharesToUser >= input.minSharesAmt
      ? PASS
      : failure("INSUFFICIENT_SHARES_MINTED", `Minted ${input.sharesToUser} shares, minimum ${input.minSharesAmt}`),
  );
}

// =============================================================================
// Withdraw
// =============================================================================

export interface WithdrawCheckInput {
  readonly status: VaultStatus;
  readonly shareAmt: bigint;
  readonly shareBalance: bigint;
  readonly slippage: bigint;
  readonly params: VaultParameters;
}

/** Checks that need no accounting reads. */
export function beforeWithdrawChecks(input: WithdrawCheckInput): void {
  assertStatus(input.status, ["Open"], "withdraw");
  if (input.shareAmt <= 0n) {
    throw new VaultError("EMPTY_WITHDRAW_AMOUNT", "Withdraw share amount must be positive");
  }
  if (input.shareBalance < input.shareAmt) {
    throw new VaultError(
      "INSUFFICIENT_SHARES_BALANCE",
      `Balance ${input.shareBalance} is below the requested ${input.shareAmt} shares`,
    );
  }
  assertSlippage(input.slippage, input.params);
}

export function withdrawValueChecks(withdrawValue: bigint, params: VaultParameters): void {
  if (withdrawValue < params.minAssetValue) {
    throw new VaultError(
      "INSUFFICIENT_WITHDRAW_VALUE",
      `Withdraw value ${withdrawValue} is below the minimum ${params.minAssetValue}`,
    );
  }
  if (withdrawValue > params.maxAssetValue) {
    throw new VaultError(
      "EXCESSIVE_WITHDRAW_VALUE",
      `Withdraw value ${withdrawValue} exceeds the maximum ${params.maxAssetValue}`,
    );
  }
}

export interface AfterWithdrawInput {
  readonly before: HealthParams;
  readonly after: HealthParams;
  readonly assetsOut: bigint;
  readonly minWithdrawAmt: bigint;
  readonly params: VaultParameters;
}

export function afterWithdrawChecks(input: AfterWithdrawInput): CheckResult {
  const { before, after } = input;
  return firstFailure(
    after.positionAmt < before.positionAmt
      ? PASS
      : failure("POSITION_NOT_DECREASED", "Position did not decrease"),
    after.equityValue < before.equityValue
      ? PASS
      : failure("EQUITY_NOT_DECREASED", "Equity did not decrease"),
    isWithinStepChange(before.debtRatio, after.debtRatio, input.params.debtRatioStepThreshold)
      ? PASS
      : failure("EXCEEDS_STEP_CHANGE", "Debt ratio moved beyond the step threshold", {
          before: before.debtRatio.toString(),
          after: after.debtRatio.toString(),
        }),
    input.assetsOut >= input.minWithdrawAmt
      ? PASS
      : failure(
          "INSUFFICIENT_ASSETS_RECEIVED",
          `Withdraw returns ${input.assetsOut}, minimum ${input.minWithdrawAmt}`,
        ),
  );
}

// =============================================================================
// Rebalance
// =============================================================================

function deltaInBand(delta: bigint, params: VaultParameters): boolean {
  return delta >= params.deltaLowerLimit && delta <= params.deltaUpperLimit;
}

function debtRatioInBand(debtRatio: bigint, params: VaultParameters): boolean {
  return debtRatio >= params.debtRatioLowerLimit && debtRatio <= params.debtRatioUpperLimit;
}

export interface RebalanceCheckInput {
  readonly status: VaultStatus;
  readonly rebalanceType: RebalanceType;
  readonly health: HealthParams;
  readonly params: VaultParameters;
}

/**
 * A rebalance is only legal when the metric it corrects is out of band.
 */
export function beforeRebalanceChecks(input: RebalanceCheckInput): void {
  const { health, params } = input;
  assertStatus(input.status, ["Open"], "rebalance");

  if (input.rebalanceType === "Delta") {
    if (params.delta !== "Neutral") {
      throw new VaultError(
        "INVALID_REBALANCE_TYPE",
        `Delta rebalances are only defined for Neutral vaults, this vault is ${params.delta}`,
      );
    }
    if (deltaInBand(health.delta, params)) {
      throw new VaultError("REBALANCE_PRECONDITIONS_NOT_MET", "Delta is within its band", {
        delta: health.delta.toString(),
      });
    }
    return;
  }

  if (debtRatioInBand(health.debtRatio, params)) {
    throw new VaultError("REBALANCE_PRECONDITIONS_NOT_MET", "Debt ratio is within its band", {
      debtRatio: health.debtRatio.toString(),
    });
  }
}

export function afterRebalanceChecks(health: HealthParams, params: VaultParameters): CheckResult {
  return firstFailure(
    params.delta !== "Neutral" || deltaInBand(health.delta, params)
      ? PASS
      : failure("REBALANCE_DELTA_OUT_OF_BOUNDS", "Delta is still out of band", {
          delta: health.delta.toString(),
        }),
    debtRatioInBand(health.debtRatio, params)
      ? PASS
      : failure("REBALANCE_DEBT_RATIO_OUT_OF_BOUNDS", "Debt ratio is still out of band", {
          debtRatio: health.debtRatio.toString(),
        }),
  );
}

// =============================================================================
// Saga bookkeeping
// =============================================================================

/**
 * The in-flight operation cache, or NO_OPERATION_CACHE when a
 * continuation runs without one (e.g. after a manual status override).
 */
export function requireCache<T>(cache: T | null, operation: string): T {
  if (cache === null) {
    throw new VaultError("NO_OPERATION_CACHE", `${operation} has no operation in flight`, { operation });
  }
  return cache;
}
