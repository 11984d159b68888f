/**
 * @pairmint/event-store — Core types.
 *
 * Two kinds of stream exist: `pair-<tokenId>` carries one pair's
 * lifecycle and `engine` carries administrative events. Each append
 * names the stream version it expects to extend, and every stored event
 * is linked to its predecessor in global order by a SHA-256 hash.
 */

import type { CategorizedError, DomainEvent, ErrorCategory } from "@pairmint/types";

// =============================================================================
// Stored Event
// =============================================================================

export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: DomainEvent["metadata"];
    readonly payload: Readonly<TPayload>;
  }>;

  readonly streamId: string;

  /** 1-based position within the stream */
  readonly version: number;

  /** 1-based position across all streams */
  readonly globalPosition: number;

  /** ISO 8601, set by the store */
  readonly appendedAt: string;

  /** Hash of the event at `globalPosition - 1`, or CHAIN_ORIGIN */
  readonly previousHash: string;

  readonly hash: string;
}

// =============================================================================
// Reads
// =============================================================================

export interface ReadOptions {
  /** Inclusive, 1-based. Default: 1 */
  readonly fromVersion?: number | undefined;
  readonly maxCount?: number | undefined;
}

export interface ReadAllOptions {
  /** Inclusive, 1-based. Default: 1 */
  readonly fromPosition?: number | undefined;
  readonly maxCount?: number | undefined;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

/** A subscriber threw while receiving a committed event. */
export interface HandlerFailure {
  readonly streamId: string;
  readonly globalPosition: number;
  readonly error: unknown;
}

export type HandlerFailureReporter = (failure: HandlerFailure) => void;

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose link verified (0 when empty). */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only store for pairing events.
 *
 * Invariants:
 * - Stream versions and global positions are contiguous from 1
 * - A pair stream reads minted, then any number of transferred, then at
 *   most one burned
 * - Subscribers receive events in global order; a subscriber that throws
 *   is reported and never undoes or blocks the append
 */
export interface EventStore {
  /**
   * Throws exactly what `append` would throw for the same arguments,
   * without storing anything. Lets a caller validate before it mutates.
   */
  checkAppend(streamId: string, type: string, expectedVersion: number): void;

  /**
   * @param expectedVersion - the stream's current version (0 for a new stream)
   * @throws EventStoreError on a version conflict or a lifecycle violation
   */
  append(streamId: string, event: DomainEvent, expectedVersion: number): StoredEvent;

  /** Events of one stream, empty if it has none. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  /** 0 for a stream with no events. */
  streamVersion(streamId: string): number;

  /** 0 for an empty store. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "INVALID_VERSION"
  | "VERSION_CONFLICT"
  | "LIFECYCLE_VIOLATION";

const CATEGORY: Readonly<Record<EventStoreErrorCode, ErrorCategory>> = {
  INVALID_STREAM_ID: "validation",
  INVALID_VERSION: "validation",
  VERSION_CONFLICT: "operational-state",
  LIFECYCLE_VIOLATION: "invariant-violation",
};

export class EventStoreError extends Error implements CategorizedError {
  public readonly category: ErrorCategory;

  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
    this.category = CATEGORY[code];
  }
}
