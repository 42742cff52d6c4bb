/**
 * @levyield/math — Error type.
 *
 * Arithmetic never wraps or silently clamps: a zero denominator or a
 * negative result where an unsigned one is required throws MathError.
 */

export type MathErrorCode =
  | "DIVISION_BY_ZERO"
  | "UNDERFLOW"
  | "INVALID_AMOUNT"
  | "INVALID_BPS"
  | "INVALID_DECIMALS";

export class MathError extends Error {
  public readonly code: MathErrorCode;
  constructor(code: MathErrorCode, message: string) {
    super(message);
    this.name = "MathError";
    this.code = code;
  }
}
