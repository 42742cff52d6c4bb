/**
 * @levyield/types — Shared domain types for the Levyield stack.
 *
 * These types are used across all Levyield packages:
 * - Addresses and token references
 * - Vault lifecycle, strategy and health vocabulary
 * - Event architecture
 * - Contracts of the external collaborators (oracle, swaps, lending, venue)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Chain types
export type { Address, RequestKey, TokenRef, Clock } from "./chain.js";
export { NATIVE_TOKEN } from "./chain.js";

// Vault types
export type {
  VaultStatus,
  Delta,
  RebalanceType,
  HealthParams,
  VaultMetrics,
} from "./vault.js";
export { VAULT_STATUSES } from "./vault.js";

// Event types
export type { DomainEvent, EventMetadata } from "./event.js";

// Collaborator contracts
export type {
  OracleQuote,
  PriceOracle,
  SwapExactInParams,
  SwapExactOutParams,
  SwapGateway,
  LendingPool,
  TokenBank,
  PoolState,
  AddLiquidityRequest,
  RemoveLiquidityRequest,
  LiquidityVenue,
  CallbackOutcome,
  LiquidityCallbackHandler,
} from "./collaborators.js";

// Runtime type guards
export {
  isVaultStatus,
  isDelta,
  isRebalanceType,
  isTokenRef,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
