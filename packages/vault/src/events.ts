/**
 * VaultEventLog — appends a vault's domain events to its stream.
 *
 * One stream per vault (streamId = vault id). Payload amounts are
 * written as decimal strings.
 */

import type { EventStore } from "@levyield/event-store";
import type { Address, Clock, DomainEvent, EventMetadata } from "@levyield/types";

export type VaultEventType =
  | "deposit.requested"
  | "deposit.completed"
  | "deposit.failed"
  | "deposit.cancelled"
  | "deposit.recovery_requested"
  | "deposit.recovery_cancelled"
  | "deposit.refunded"
  | "withdraw.requested"
  | "withdraw.completed"
  | "withdraw.failed"
  | "withdraw.cancelled"
  | "withdraw.recovery_requested"
  | "withdraw.recovery_cancelled"
  | "withdraw.recovered"
  | "rebalance.requested"
  | "rebalance.completed"
  | "rebalance.open"
  | "rebalance.cancelled"
  | "rebalance.closed"
  | "compound.requested"
  | "compound.completed"
  | "compound.cancelled"
  | "compound.position_synced"
  | "emergency.pause_requested"
  | "emergency.paused"
  | "emergency.repay_requested"
  | "emergency.repay_cancelled"
  | "emergency.repaid"
  | "emergency.borrowed"
  | "emergency.resume_requested"
  | "emergency.resume_cancelled"
  | "emergency.resumed"
  | "emergency.closed"
  | "emergency.withdrawn"
  | "fee.minted"
  | "payout.native_fallback"
  | "status.changed"
  | "callback.rejected"
  | "parameters.updated"
  | "keeper.updated"
  | "treasury.updated";

export type EventValue = bigint | string | number | boolean | null;

export interface EventContext {
  readonly actor: Address;
  /** Request key of the operation, or a local id for synchronous ones */
  readonly correlationId: string;
  readonly source?: EventMetadata["source"];
}

export class VaultEventLog {
  private seq = 0;

  constructor(
    private readonly store: EventStore,
    readonly streamId: string,
    private readonly clock: Clock,
  ) {}

  emit(
    type: VaultEventType,
    context: EventContext,
    payload: Readonly<Record<string, EventValue>> = {},
  ): DomainEvent {
    this.seq += 1;
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: `${this.streamId}-${this.seq}`,
        timestamp: new Date(this.clock.now() * 1000).toISOString(),
        actor: context.actor,
        correlationId: context.correlationId,
        source: context.source ?? "vault",
      },
      payload: serialize(payload),
    };
    this.store.append(this.streamId, [event]);
    return event;
  }

  /** A correlation id for operations that never get a venue key. */
  nextLocalId(prefix: string): string {
    return `${this.streamId}:${prefix}:${this.seq + 1}`;
  }
}

function serialize(payload: Readonly<Record<string, EventValue>>): Record<string, string | number | boolean | null> {
  const out: Record<string, string | number | boolean | null> = {};
  for (const [key, value] of Object.entries(payload)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}
