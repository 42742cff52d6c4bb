/**
 * Vault event logging.
 *
 * Every event appended to the devnet store is logged once: failures
 * (`*.failed`, `callback.rejected`) at warn, everything else at info.
 */

import type { Logger } from "pino";
import type { StoredEvent } from "@levyield/event-store";

const WARN_TYPES = new Set(["callback.rejected"]);

export function isWarningEvent(type: string): boolean {
  return type.endsWith(".failed") || WARN_TYPES.has(type);
}

export function logVaultEvent(logger: Logger, stored: StoredEvent): void {
  const { event } = stored;
  const fields = {
    type: event.type,
    vaultId: stored.streamId,
    correlationId: event.metadata.correlationId,
    actor: event.metadata.actor,
    position: stored.globalPosition,
  };
  if (isWarningEvent(event.type)) {
    logger.warn({ ...fields, payload: event.payload }, event.type);
  } else {
    logger.info(fields, event.type);
  }
}
