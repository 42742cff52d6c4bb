/**
 * @levyield/math — Deterministic fixed-point arithmetic.
 *
 * All values are bigint. USD values and ratios are scaled by
 * SAFE_MULTIPLIER (1e18); token amounts keep their native decimals.
 *
 * Rules:
 * - No floating-point operations
 * - Division rounds down unless asked otherwise
 * - Unsigned subtraction either throws (checkedSub) or floors at zero
 *   (subOrZero); the caller picks which, nothing wraps
 * - Zero runtime dependencies
 */

import { MathError } from "./errors.js";

// ─── Constants ───────────────────────────────────────────────────────────

/** 1e18, the scale of every USD value and ratio. */
export const SAFE_MULTIPLIER = 1_000_000_000_000_000_000n;

/** Denominator of basis-point quantities. */
export const BPS_DENOMINATOR = 10_000n;

export type Rounding = "down" | "up";

// ─── Core ────────────────────────────────────────────────────────────────

/**
 * Compute `a * b / denominator`.
 *
 * mulDiv(10n, 3n, 2n) → 15n
 * mulDiv(1n, 1n, 3n, "up") → 1n
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  denominator: bigint,
  rounding: Rounding = "down",
): bigint {
  if (denominator === 0n) {
    throw new MathError("DIVISION_BY_ZERO", `Division by zero: ${a} * ${b} / 0`);
  }
  const product = a * b;
  const quotient = product / denominator;
  if (rounding === "down" || product % denominator === 0n) {
    return quotient;
  }
  return quotient + 1n;
}

/**
 * Subtract b from a, throwing when the result would be negative.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new MathError("UNDERFLOW", `Underflow: ${a} - ${b}`);
  }
  return a - b;
}

/**
 * Subtract b from a, flooring at zero.
 */
export function subOrZero(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

export function abs(x: bigint): bigint {
  return x < 0n ? -x : x;
}

export function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

// ─── Basis points ────────────────────────────────────────────────────────

function assertBps(bps: bigint): void {
  if (bps < 0n || bps > BPS_DENOMINATOR) {
    throw new MathError("INVALID_BPS", `Basis points must be in [0, 10000], got ${bps}`);
  }
}

/**
 * Reduce an amount by `bps` (a minimum-output bound).
 *
 * applySlippage(1000n, 50n) → 995n
 */
export function applySlippage(amount: bigint, bps: bigint): bigint {
  assertBps(bps);
  return (amount * (BPS_DENOMINATOR - bps)) / BPS_DENOMINATOR;
}

/**
 * Inflate an amount by `bps` (a maximum-input bound).
 *
 * inflateBySlippage(1000n, 50n) → 1005n
 */
export function inflateBySlippage(amount: bigint, bps: bigint): bigint {
  assertBps(bps);
  return (amount * (BPS_DENOMINATOR + bps)) / BPS_DENOMINATOR;
}

/**
 * Take `bps` of an amount.
 */
export function bpsOf(amount: bigint, bps: bigint): bigint {
  assertBps(bps);
  return (amount * bps) / BPS_DENOMINATOR;
}

// ─── Decimals ────────────────────────────────────────────────────────────

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
    throw new MathError("INVALID_DECIMALS", `Decimals must be an integer in [0, 18], got ${decimals}`);
  }
}

export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0) {
    throw new MathError("INVALID_DECIMALS", `pow10 exponent must be a non-negative integer, got ${exp}`);
  }
  return 10n ** BigInt(exp);
}

/**
 * Normalise a raw token amount to 18 decimals.
 *
 * scaleTo18(1_000_000n, 6) → 1e18
 */
export function scaleTo18(amount: bigint, decimals: number): bigint {
  assertDecimals(decimals);
  return amount * pow10(18 - decimals);
}

/**
 * Convert an 18-decimal quantity back to raw token units (rounds down).
 *
 * scaleFrom18(1e18, 6) → 1_000_000n
 */
export function scaleFrom18(amount18: bigint, decimals: number): bigint {
  assertDecimals(decimals);
  return amount18 / pow10(18 - decimals);
}

// ─── Decimal strings ─────────────────────────────────────────────────────

/**
 * Parse a decimal string into raw units.
 *
 * "100.50" with decimals=6 → 100500000n
 * "-0.5" with decimals=18 → -5e17
 */
export function parseUnits(amount: string, decimals: number): bigint {
  assertDecimals(decimals);
  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new MathError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const negative = trimmed.startsWith("-");
  const unsigned = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = unsigned.split(".");

  if (fracPart.length > decimals) {
    throw new MathError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${fracPart.length} decimal places, but only ${decimals} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Format raw units as a decimal string with trailing zeros removed.
 *
 * 100500000n with decimals=6 → "100.5"
 * 2n * 10n ** 18n with decimals=18 → "2"
 */
export function formatUnits(value: bigint, decimals: number): string {
  assertDecimals(decimals);
  const negative = value < 0n;
  const unsigned = negative ? -value : value;

  if (decimals === 0) {
    return `${negative ? "-" : ""}${unsigned}`;
  }

  const str = unsigned.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals).replace(/0+$/, "");
  const body = fracPart.length > 0 ? `${intPart}.${fracPart}` : intPart;

  return negative ? `-${body}` : body;
}
