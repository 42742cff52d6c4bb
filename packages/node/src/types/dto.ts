/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts travel as decimal strings and are parsed to bigint here, so
 * route handlers only ever see validated native values.
 */

import { z } from "zod";
import { VAULT_STATUSES } from "@levyield/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "expected an unsigned decimal integer string")
  .transform((s) => BigInt(s));

export const SignedAmountSchema = z
  .string()
  .regex(/^-?\d+$/, "expected a decimal integer string")
  .transform((s) => BigInt(s));

const AddressSchema = z.string().min(1).max(128);

const CallerSchema = z.object({ caller: AddressSchema });

const RebalanceTypeSchema = z.enum(["Delta", "Debt"]);

// =============================================================================
// User operations
// =============================================================================

export const DepositSchema = z.object({
  caller: AddressSchema,
  /** Omitted with `native: true` */
  token: AddressSchema.optional(),
  native: z.boolean().default(false),
  amount: AmountSchema,
  minSharesAmt: AmountSchema.default("0"),
  slippage: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  caller: AddressSchema,
  /** Payout token; LP vaults only */
  token: AddressSchema.optional(),
  shareAmt: AmountSchema,
  minWithdrawAmt: AmountSchema.default("0"),
  slippage: AmountSchema,
  unwrap: z.boolean().default(false),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const EmergencyWithdrawSchema = z.object({
  caller: AddressSchema,
  shareAmt: AmountSchema,
});

// =============================================================================
// Keeper / owner operations
// =============================================================================

export const CallerOnlySchema = CallerSchema;

export const RebalanceAddSchema = z.object({
  caller: AddressSchema,
  rebalanceType: RebalanceTypeSchema,
  /** LP vaults borrow both tokens */
  borrowTokenAAmt: AmountSchema.default("0"),
  borrowTokenBAmt: AmountSchema.default("0"),
  /** LRT vaults borrow the base token */
  borrowAmt: AmountSchema.default("0"),
});

export type RebalanceAddDto = z.infer<typeof RebalanceAddSchema>;

export const RebalanceRemoveSchema = z.object({
  caller: AddressSchema,
  rebalanceType: RebalanceTypeSchema,
  /** LP or LRT amount, depending on the vault */
  amount: AmountSchema,
});

export const CompoundSchema = z.object({
  caller: AddressSchema,
  tokenIn: AddressSchema,
  tokenOut: AddressSchema,
  amountIn: AmountSchema,
});

export const StatusChangeSchema = z.object({
  caller: AddressSchema,
  status: z.enum(VAULT_STATUSES),
});

export const UpdateKeeperSchema = z.object({
  caller: AddressSchema,
  keeper: AddressSchema,
  approved: z.boolean(),
});

export const UpdateTreasurySchema = z.object({
  caller: AddressSchema,
  treasury: AddressSchema,
});

// =============================================================================
// Venue and market controls
// =============================================================================

export const ExecuteRequestSchema = z.object({
  haircutBps: AmountSchema.default("0"),
});

export const FundSchema = z.object({
  holder: AddressSchema,
  token: AddressSchema,
  amount: AmountSchema,
});

export const SetPriceSchema = z.object({
  token: AddressSchema,
  /** 8-decimal USD price */
  price: AmountSchema,
});

export const AdvanceClockSchema = z.object({
  seconds: z.number().int().min(0),
});

// =============================================================================
// Queries
// =============================================================================

/** `after` is a global position, or a stream version for one stream */
export const ListEventsQuerySchema = z.object({
  after: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
