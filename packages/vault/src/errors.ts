/**
 * @levyield/vault — Error type.
 *
 * Every guard failure has its own code so callers can react to the
 * exact condition (e.g. INSUFFICIENT_DEPOSIT_VALUE vs INSUFFICIENT_CAPACITY).
 * Collaborator failures (oracle, swap, lending) are never wrapped.
 */

export type VaultErrorCode =
  // Access / concurrency
  | "UNAUTHORIZED"
  | "REENTRANT_CALL"
  | "INVALID_STATUS"
  // Configuration
  | "INVALID_PARAMETERS"
  // Deposit
  | "EMPTY_DEPOSIT_AMOUNT"
  | "INVALID_DEPOSIT_TOKEN"
  | "INSUFFICIENT_DEPOSIT_VALUE"
  | "EXCESSIVE_DEPOSIT_VALUE"
  | "INSUFFICIENT_CAPACITY"
  | "SLIPPAGE_BELOW_MINIMUM"
  | "INSUFFICIENT_SHARES_MINTED"
  | "POSITION_NOT_INCREASED"
  // Withdraw
  | "EMPTY_WITHDRAW_AMOUNT"
  | "INVALID_WITHDRAW_TOKEN"
  | "INSUFFICIENT_SHARES_BALANCE"
  | "INSUFFICIENT_WITHDRAW_VALUE"
  | "EXCESSIVE_WITHDRAW_VALUE"
  | "INSUFFICIENT_ASSETS_RECEIVED"
  | "POSITION_NOT_DECREASED"
  | "EQUITY_NOT_DECREASED"
  // Shared post-check
  | "EXCEEDS_STEP_CHANGE"
  // Rebalance
  | "INVALID_REBALANCE_TYPE"
  | "INVALID_REBALANCE_AMOUNT"
  | "REBALANCE_PRECONDITIONS_NOT_MET"
  | "REBALANCE_DELTA_OUT_OF_BOUNDS"
  | "REBALANCE_DEBT_RATIO_OUT_OF_BOUNDS"
  // Compound
  | "INVALID_COMPOUND_TOKEN"
  | "INVALID_COMPOUND_AMOUNT"
  // Fees
  | "FEE_COLLECTION_PAUSED"
  // Saga bookkeeping
  | "NO_OPERATION_CACHE";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly details?: Readonly<Record<string, string>>;

  constructor(
    code: VaultErrorCode,
    message: string,
    details?: Readonly<Record<string, string>>,
  ) {
    super(message);
    this.name = "VaultError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}
