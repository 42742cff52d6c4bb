/**
 * @levyield/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for tests, the devnet node and
 * short-lived processes; all state is lost on process exit.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch, after the append is complete
 */

import type { DomainEvent } from "@levyield/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    const currentVersion = stream.length;
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = events.map((event, i) => {
      const content = {
        event,
        streamId,
        version: currentVersion + i + 1,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const hash = computeEventHash(content, previousHash);
      this._lastHash = hash;
      return { ...content, hash, previousHash };
    });

    stream.push(...stored);
    this._streams.set(streamId, stream);
    this._globalLog.push(...stored);

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + events.length,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    const result = stream.filter((e) => e.version >= fromVersion);
    return options?.maxCount !== undefined ? result.slice(0, options.maxCount) : result;
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const result = this._globalLog.filter((e) => e.globalPosition >= fromPosition);
    return options?.maxCount !== undefined ? result.slice(0, options.maxCount) : result;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    const subscribers = this._streamSubscribers.get(streamId) ?? new Set<EventHandler>();
    subscribers.add(handler);
    this._streamSubscribers.set(streamId, subscribers);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: AppendOptions["expectedVersion"],
  ): void {
    if (expected === undefined || expected === "any") return;

    const wanted = expected === "no_stream" ? 0 : expected;
    if (currentVersion !== wanted) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${String(expected)}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    for (const event of events) {
      for (const handler of streamSubs ?? []) {
        handler(event);
      }
      for (const handler of this._globalSubscribers) {
        handler(event);
      }
    }
  }
}
