/**
 * @levyield/event-store — Hash chain for tamper-evident vault logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to its predecessor:
 *
 *   event[0].hash = sha256(canonicalize(event[0]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Editing any stored event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  StoredEventContent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

/**
 * SHA-256 (hex) of an event's canonical content and its predecessor's hash.
 */
export function computeEventHash(
  content: StoredEventContent,
  previousHash: string,
): string {
  const canonical = canonicalize({
    event: content.event,
    streamId: content.streamId,
    version: content.version,
    globalPosition: content.globalPosition,
    appendedAt: content.appendedAt,
  });
  return createHash("sha256").update(canonical + previousHash).digest("hex");
}

/**
 * Verify a sequence of events given in global position order.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const stored of events) {
    if (stored.previousHash !== previousHash) {
      errors.push({
        position: stored.globalPosition,
        reason: `previousHash mismatch at position ${stored.globalPosition}`,
      });
    }

    const { hash, previousHash: linked, ...content } = stored;
    if (computeEventHash(content, linked) !== hash) {
      errors.push({
        position: stored.globalPosition,
        reason: `Hash mismatch at position ${stored.globalPosition}`,
      });
    }

    previousHash = hash;
    lastVerifiedPosition = stored.globalPosition;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
