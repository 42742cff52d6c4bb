/**
 * @levyield/sim — Error type.
 *
 * Every simulated collaborator fails with SimError. The vault core
 * never catches these; they surface to the caller unchanged.
 */

export type SimErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "UNKNOWN_TOKEN"
  | "NO_PRICE_FEED"
  | "STALE_FEED"
  | "BROKEN_FEED"
  | "SAME_TOKEN"
  | "DEADLINE_EXPIRED"
  | "SLIPPAGE_EXCEEDED"
  | "INSUFFICIENT_LIQUIDITY"
  | "REPAY_EXCEEDS_DEBT"
  | "NATIVE_TRANSFER_REJECTED"
  | "UNKNOWN_REQUEST"
  | "NO_CALLBACK_HANDLER";

export class SimError extends Error {
  public readonly code: SimErrorCode;
  constructor(code: SimErrorCode, message: string) {
    super(message);
    this.name = "SimError";
    this.code = code;
  }
}
