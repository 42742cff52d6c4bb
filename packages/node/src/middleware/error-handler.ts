/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain error codes (VaultError, SimError,
 * EventStoreError) to HTTP status codes.
 */

import type { Context } from "hono";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, number>> = {
  // Vault: who may call, and when
  UNAUTHORIZED: 403,
  REENTRANT_CALL: 409,
  INVALID_STATUS: 409,
  INVALID_PARAMETERS: 400,
  NO_OPERATION_CACHE: 409,
  FEE_COLLECTION_PAUSED: 409,

  // Vault: guard failures on the request itself
  EMPTY_DEPOSIT_AMOUNT: 422,
  INVALID_DEPOSIT_TOKEN: 422,
  INSUFFICIENT_DEPOSIT_VALUE: 422,
  EXCESSIVE_DEPOSIT_VALUE: 422,
  INSUFFICIENT_CAPACITY: 422,
  SLIPPAGE_BELOW_MINIMUM: 422,
  INSUFFICIENT_SHARES_MINTED: 422,
  POSITION_NOT_INCREASED: 422,
  EMPTY_WITHDRAW_AMOUNT: 422,
  INVALID_WITHDRAW_TOKEN: 422,
  INSUFFICIENT_SHARES_BALANCE: 422,
  INSUFFICIENT_WITHDRAW_VALUE: 422,
  EXCESSIVE_WITHDRAW_VALUE: 422,
  INSUFFICIENT_ASSETS_RECEIVED: 422,
  POSITION_NOT_DECREASED: 422,
  EQUITY_NOT_DECREASED: 422,
  EXCEEDS_STEP_CHANGE: 422,
  INVALID_REBALANCE_TYPE: 422,
  INVALID_REBALANCE_AMOUNT: 422,
  REBALANCE_PRECONDITIONS_NOT_MET: 422,
  REBALANCE_DELTA_OUT_OF_BOUNDS: 422,
  REBALANCE_DEBT_RATIO_OUT_OF_BOUNDS: 422,
  INVALID_COMPOUND_TOKEN: 422,
  INVALID_COMPOUND_AMOUNT: 422,

  // Simulated collaborators
  INVALID_AMOUNT: 400,
  UNKNOWN_TOKEN: 404,
  UNKNOWN_REQUEST: 404,
  NO_PRICE_FEED: 424,
  STALE_FEED: 424,
  BROKEN_FEED: 424,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_LIQUIDITY: 422,
  SLIPPAGE_EXCEEDED: 422,
  DEADLINE_EXPIRED: 422,
  SAME_TOKEN: 400,
  REPAY_EXCEEDS_DEBT: 422,

  // Event store
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
};

function domainCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function domainDetails(err: Error): Record<string, unknown> | undefined {
  if ("details" in err && typeof err.details === "object" && err.details !== null) {
    return Object.fromEntries(Object.entries(err.details));
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ApiError) {
    return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
  }

  const code = domainCode(err);
  const status = code !== undefined ? STATUS_MAP[code] ?? 500 : 500;

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const envelope = createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, domainDetails(err));
  return c.json(envelope, status as 400);
}
