/**
 * @levyield/event-store — Append-only vault event streams.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and the devnet node
 * - Hash chain helpers for tamper evidence
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  StoredEventContent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
