/**
 * @levyield/math — Deterministic fixed-point arithmetic.
 *
 * @packageDocumentation
 */

export { MathError } from "./errors.js";
export type { MathErrorCode } from "./errors.js";

export {
  SAFE_MULTIPLIER,
  BPS_DENOMINATOR,
  mulDiv,
  checkedSub,
  subOrZero,
  abs,
  absDiff,
  minBigInt,
  maxBigInt,
  applySlippage,
  inflateBySlippage,
  bpsOf,
  pow10,
  scaleTo18,
  scaleFrom18,
  parseUnits,
  formatUnits,
} from "./fixed-point.js";
export type { Rounding } from "./fixed-point.js";
