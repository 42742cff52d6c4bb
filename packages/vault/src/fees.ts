/**
 * Share pricing and management fee accrual.
 *
 * `supplyWithFee` is totalSupply + pendingFee: fee shares owed to the
 * treasury dilute holders from the moment they accrue, not from the
 * moment they are minted.
 */

import { mulDiv, SAFE_MULTIPLIER } from "@levyield/math";

/**
 * totalSupply × feePerSecond × elapsed / 1e18
 */
export function pendingFee(totalSupply: bigint, feePerSecond: bigint, elapsedSeconds: number): bigint {
  if (elapsedSeconds <= 0) return 0n;
  return mulDiv(totalSupply * feePerSecond, BigInt(elapsedSeconds), SAFE_MULTIPLIER);
}

/**
 * Equity per share. Throws DIVISION_BY_ZERO before the first deposit;
 * callers that can run at bootstrap must check `supplyWithFee` first.
 */
export function svTokenValue(equityValue: bigint, supplyWithFee: bigint): bigint {
  return mulDiv(equityValue, SAFE_MULTIPLIER, supplyWithFee);
}

/**
 * Shares worth `value` at the current equity. At bootstrap (no shares
 * or no equity) one share is minted per unit of value.
 */
export function valueToShares(value: bigint, currentEquity: bigint, supplyWithFee: bigint): bigint {
  if (supplyWithFee === 0n || currentEquity === 0n) return value;
  return mulDiv(value, supplyWithFee, currentEquity);
}
