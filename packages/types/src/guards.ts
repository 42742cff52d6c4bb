/**
 * Runtime Type Guards
 *
 * Narrowing functions for Levyield domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, external integrations).
 */

import type { TokenRef } from "./chain.js";
import type { DomainEvent, EventMetadata } from "./event.js";
import type { Delta, RebalanceType, VaultStatus } from "./vault.js";
import { VAULT_STATUSES } from "./vault.js";

// =============================================================================
// Vault guards
// =============================================================================

const STATUSES = new Set<string>(VAULT_STATUSES);
const DELTAS = new Set<string>(["Neutral", "Long", "Short"]);
const REBALANCE_TYPES = new Set<string>(["Delta", "Debt"]);

export function isVaultStatus(value: unknown): value is VaultStatus {
  return typeof value === "string" && STATUSES.has(value);
}

export function isDelta(value: unknown): value is Delta {
  return typeof value === "string" && DELTAS.has(value);
}

export function isRebalanceType(value: unknown): value is RebalanceType {
  return typeof value === "string" && REBALANCE_TYPES.has(value);
}

// =============================================================================
// Chain guards
// =============================================================================

export function isTokenRef(value: unknown): value is TokenRef {
  if (value === null || typeof value !== "object") return false;
  return (
    "address" in value &&
    typeof value.address === "string" &&
    value.address.length > 0 &&
    "symbol" in value &&
    typeof value.symbol === "string" &&
    "decimals" in value &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0 &&
    value.decimals <= 18
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault", "venue", "keeper", "node"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  return (
    "eventId" in value &&
    typeof value.eventId === "string" &&
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    "actor" in value &&
    typeof value.actor === "string" &&
    "correlationId" in value &&
    typeof value.correlationId === "string" &&
    "source" in value &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  return (
    "type" in value &&
    typeof value.type === "string" &&
    "metadata" in value &&
    isEventMetadata(value.metadata) &&
    "payload" in value &&
    value.payload !== null &&
    typeof value.payload === "object"
  );
}
