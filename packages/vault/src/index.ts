/**
 * @levyield/vault — Leveraged-yield vaults.
 *
 * Two variants share one kernel (BaseVault):
 * - LpVault: LP position, venue settles adds and removes asynchronously
 * - LrtVault: liquid restaked token, every operation settles in the call
 *
 * Design rules:
 * - One mutating call per vault at a time (ReentrancyGuard)
 * - Preconditions throw before anything moves; after-checks return a result
 * - Every state change is appended to the vault's event stream
 * - Collaborator failures propagate unchanged
 */

// Kernel
export { BaseVault } from "./base-vault.js";
export type { BaseVaultConfig, KernelState, OperationKernel, PayoutForm } from "./base-vault.js";
export { VaultError } from "./errors.js";
export type { VaultErrorCode } from "./errors.js";
export { validateParameters } from "./parameters.js";
export type { VaultParameters } from "./parameters.js";
export { VaultEventLog } from "./events.js";
export type { EventContext, EventValue, VaultEventType } from "./events.js";
export { pendingFee, svTokenValue, valueToShares } from "./fees.js";
export {
  assertStatus,
  isWithinStepChange,
  firstFailure,
  beforeDepositChecks,
  afterDepositChecks,
  beforeWithdrawChecks,
  withdrawValueChecks,
  afterWithdrawChecks,
  beforeRebalanceChecks,
  afterRebalanceChecks,
  requireCache,
} from "./checks.js";
export type { CheckResult } from "./checks.js";
export { OracleAdapter } from "./oracle-adapter.js";
export { TradeManager } from "./trade.js";
export { ShareLedger } from "./share-ledger.js";
export { ReentrancyGuard } from "./reentrancy.js";
export { AccessControl } from "./access.js";

// LP variant
export { LpVault } from "./lp/lp-vault.js";
export { LpReader } from "./lp/reader.js";
export type { LpAccounts } from "./lp/reader.js";
export { LpManager } from "./lp/manager.js";
export { ADD_CANCELLED, ADD_EXECUTED, REMOVE_CANCELLED, REMOVE_EXECUTED } from "./lp/callback-router.js";
export type { EmergencyWithdrawResult } from "./lp/emergency.js";
export { ZERO_PAIR } from "./lp/types.js";
export type {
  CompoundParams,
  DepositRequestResult,
  LpDepositParams,
  LpRebalanceAddParams,
  LpRebalanceRemoveParams,
  LpVaultConfig,
  LpWithdrawParams,
  PendingRequest,
  TokenPair,
  WithdrawRequestResult,
} from "./lp/types.js";

// LRT variant
export { LrtVault } from "./lrt/lrt-vault.js";
export { LrtReader } from "./lrt/reader.js";
export { LrtManager } from "./lrt/manager.js";
export type { LrtRebalanceResult } from "./lrt/rebalance.js";
export type {
  LrtDepositParams,
  LrtDepositResult,
  LrtEmergencyWithdrawResult,
  LrtRebalanceAddParams,
  LrtRebalanceRemoveParams,
  LrtVaultConfig,
  LrtWithdrawParams,
  LrtWithdrawResult,
} from "./lrt/types.js";
