/**
 * Event Types
 *
 * Append-only event architecture.
 * Every vault state transition is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Payload amounts are decimal strings (bigint is not JSON-safe)
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event (user, keeper, venue callback) */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups every event of one operation (e.g., the venue request key) */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "vault" | "venue" | "keeper" | "node";
}

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "deposit.requested", "emergency.paused") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
