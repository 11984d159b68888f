/**
 * @pairmint/event-store — In-memory EventStore.
 *
 * Holds every stream in process memory; state is lost on exit.
 * Subscribers are called synchronously once the event is stored. An
 * append made from inside a subscriber is queued behind the event being
 * delivered, so every subscriber sees global order.
 */

import type { DomainEvent } from "@pairmint/types";
import type {
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HandlerFailure,
  HandlerFailureReporter,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { CHAIN_ORIGIN, linkHash, verifyChain } from "./hash-chain.js";
import { acceptedNext, streamKind } from "./pair-events.js";
import type { StreamKind } from "./pair-events.js";

export interface InMemoryEventStoreOptions {
  /** Called for each subscriber error, after it is recorded. */
  readonly onHandlerFailure?: HandlerFailureReporter | undefined;

  /** Default: () => new Date() */
  readonly clock?: (() => Date) | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _log: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _failures: HandlerFailure[] = [];
  private readonly _undelivered: StoredEvent[] = [];
  private _delivering = false;

  private readonly _onHandlerFailure: HandlerFailureReporter | undefined;
  private readonly _clock: () => Date;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._onHandlerFailure = options.onHandlerFailure;
    this._clock = options.clock ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  checkAppend(streamId: string, type: string, expectedVersion: number): void {
    const kind = this._kindOf(streamId);
    const stream = this._streams.get(streamId) ?? [];

    if (expectedVersion !== stream.length) {
      throw new EventStoreError(
        "VERSION_CONFLICT",
        `Stream "${streamId}" is at version ${String(stream.length)}, expected ${String(expectedVersion)}`,
        streamId,
      );
    }

    const head = stream[stream.length - 1]?.event.type;
    const accepted: readonly string[] = acceptedNext(kind, head);
    if (!accepted.includes(type)) {
      throw new EventStoreError(
        "LIFECYCLE_VIOLATION",
        head === undefined
          ? `Stream "${streamId}" cannot start with ${type}`
          : `Stream "${streamId}" cannot take ${type} after ${head}`,
        streamId,
      );
    }
  }

  append(streamId: string, event: DomainEvent, expectedVersion: number): StoredEvent {
    this.checkAppend(streamId, event.type, expectedVersion);

    const previousHash = this._log[this._log.length - 1]?.hash ?? CHAIN_ORIGIN;
    const record = {
      event: { type: event.type, metadata: event.metadata, payload: event.payload },
      streamId,
      version: expectedVersion + 1,
      globalPosition: this._log.length + 1,
      appendedAt: this._clock().toISOString(),
    };
    const stored: StoredEvent = { ...record, previousHash, hash: linkHash(record, previousHash) };

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      this._streams.set(streamId, [stored]);
    } else {
      stream.push(stored);
    }
    this._log.push(stored);

    this._deliver(stored);
    return stored;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options: ReadOptions = {}): readonly StoredEvent[] {
    this._kindOf(streamId);
    const fromVersion = options.fromVersion ?? 1;
    if (!Number.isInteger(fromVersion) || fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be a positive integer, got ${String(fromVersion)}`,
        streamId,
      );
    }
    const stream = this._streams.get(streamId) ?? [];
    return page(stream, fromVersion, options.maxCount);
  }

  readAll(options: ReadAllOptions = {}): readonly StoredEvent[] {
    return page(this._log, options.fromPosition ?? 1, options.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._kindOf(streamId);
    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
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

  /** Every subscriber error so far, oldest first. */
  get handlerFailures(): readonly HandlerFailure[] {
    return this._failures;
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _kindOf(streamId: string): StreamKind {
    const kind = streamKind(streamId);
    if (kind === undefined) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        `Unknown stream "${streamId}": expected "engine" or "pair-<tokenId>"`,
        streamId,
      );
    }
    return kind;
  }

  private _deliver(stored: StoredEvent): void {
    this._undelivered.push(stored);
    if (this._delivering) {
      return;
    }
    this._delivering = true;
    try {
      for (let next = this._undelivered.shift(); next !== undefined; next = this._undelivered.shift()) {
        const handlers = [
          ...(this._streamSubscribers.get(next.streamId) ?? []),
          ...this._globalSubscribers,
        ];
        for (const handler of handlers) {
          this._call(handler, next);
        }
      }
    } finally {
      this._delivering = false;
    }
  }

  private _call(handler: EventHandler, stored: StoredEvent): void {
    try {
      handler(stored);
    } catch (error) {
      const failure: HandlerFailure = {
        streamId: stored.streamId,
        globalPosition: stored.globalPosition,
        error,
      };
      this._failures.push(failure);
      this._onHandlerFailure?.(failure);
    }
  }
}

function page(
  events: readonly StoredEvent[],
  from: number,
  maxCount: number | undefined,
): readonly StoredEvent[] {
  const start = Math.max(from, 1) - 1;
  return maxCount === undefined ? events.slice(start) : events.slice(start, start + maxCount);
}
