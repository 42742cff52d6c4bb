/**
 * Type barrel — re-exports all public types from @levyield/node.
 */

// DTOs
export {
  AmountSchema,
  SignedAmountSchema,
  DepositSchema,
  WithdrawSchema,
  EmergencyWithdrawSchema,
  CallerOnlySchema,
  RebalanceAddSchema,
  RebalanceRemoveSchema,
  CompoundSchema,
  StatusChangeSchema,
  UpdateKeeperSchema,
  UpdateTreasurySchema,
  ExecuteRequestSchema,
  FundSchema,
  SetPriceSchema,
  AdvanceClockSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type { DepositDto, WithdrawDto, RebalanceAddDto, ListEventsQuery } from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// JSON
export { toJson } from "./json.js";
export type { JsonValue } from "./json.js";

// App env
export type { AppEnv } from "./api-contract.js";
