/**
 * Vault risk parameters and their validation.
 *
 * Bounds are validated when a vault is created and when the owner
 * updates them; operations never re-validate them.
 */

import { BPS_DENOMINATOR, SAFE_MULTIPLIER } from "@levyield/math";
import type { Delta } from "@levyield/types";
import { VaultError } from "./errors.js";

export interface VaultParameters {
  /** Target leverage (1e18 = 1x). Must exceed 1x. */
  readonly leverage: bigint;

  readonly delta: Delta;

  /** Max relative debt-ratio move per deposit or withdraw (bps) */
  readonly debtRatioStepThreshold: bigint;

  readonly debtRatioUpperLimit: bigint;
  readonly debtRatioLowerLimit: bigint;

  /** Signed 1e18 bounds, enforced for Neutral vaults only */
  readonly deltaUpperLimit: bigint;
  readonly deltaLowerLimit: bigint;

  /** Floor on user-supplied slippage (bps) */
  readonly minVaultSlippage: bigint;

  /** Slippage used for keeper-driven swaps and liquidity requests (bps) */
  readonly swapSlippage: bigint;

  /** Deposit / withdraw value bounds (USD, 1e18) */
  readonly minAssetValue: bigint;
  readonly maxAssetValue: bigint;

  /** Management fee as a share fraction per second (1e18) */
  readonly feePerSecond: bigint;

  /** Seconds added to the current time for swap deadlines */
  readonly swapDeadlineSeconds: number;
}

export function validateParameters(
  params: VaultParameters,
  allowedDeltas: readonly Delta[],
): void {
  const fail = (message: string): never => {
    throw new VaultError("INVALID_PARAMETERS", message);
  };

  if (!allowedDeltas.includes(params.delta)) {
    fail(`Strategy ${params.delta} is not supported (expected one of ${allowedDeltas.join(", ")})`);
  }
  if (params.leverage <= SAFE_MULTIPLIER) {
    fail(`leverage must exceed 1e18, got ${params.leverage}`);
  }
  if (params.debtRatioUpperLimit < params.debtRatioLowerLimit) {
    fail("debtRatioUpperLimit must be >= debtRatioLowerLimit");
  }
  if (params.deltaUpperLimit < params.deltaLowerLimit) {
    fail("deltaUpperLimit must be >= deltaLowerLimit");
  }
  if (params.debtRatioLowerLimit < 0n) {
    fail("debtRatioLowerLimit must be >= 0");
  }
  for (const [name, bps] of [
    ["debtRatioStepThreshold", params.debtRatioStepThreshold],
    ["minVaultSlippage", params.minVaultSlippage],
    ["swapSlippage", params.swapSlippage],
  ] as const) {
    if (bps < 0n || bps > BPS_DENOMINATOR) {
      fail(`${name} must be in [0, 10000] bps, got ${bps}`);
    }
  }
  if (params.minAssetValue < 0n || params.maxAssetValue < params.minAssetValue) {
    fail("asset value bounds must satisfy 0 <= minAssetValue <= maxAssetValue");
  }
  if (params.feePerSecond < 0n) {
    fail("feePerSecond must be >= 0");
  }
  if (!Number.isInteger(params.swapDeadlineSeconds) || params.swapDeadlineSeconds < 0) {
    fail("swapDeadlineSeconds must be a non-negative integer");
  }
}
