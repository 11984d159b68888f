/**
 * @pairmint/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore, hash-chained for tamper evidence
 * - Pairing event definitions and the per-stream lifecycle
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  HandlerFailure,
  HandlerFailureReporter,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { CHAIN_ORIGIN, linkHash, verifyChain } from "./hash-chain.js";
export type { UnlinkedEvent } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Pairing domain events
export { PAIR_EVENTS, ENGINE_STREAM, pairStreamId, streamKind, acceptedNext } from "./pair-events.js";
export type {
  PairEventType,
  StreamKind,
  PairEventPayloads,
  PairMintedPayload,
  PairBurnedPayload,
  PairTransferredPayload,
  EmergencyWithdrawalPayload,
  PauseChangedPayload,
} from "./pair-events.js";
