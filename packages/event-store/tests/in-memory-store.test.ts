/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: versions, global positions, stored data
 * - Expected versions and the pair lifecycle
 * - Stream identifiers
 * - Reads with offsets and limits
 * - Subscriptions: ordering, failures, unsubscribe
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@pairmint/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import type { HandlerFailure } from "../src/types.js";
import { ENGINE_STREAM, PAIR_EVENTS, pairStreamId } from "../src/pair-events.js";

// =============================================================================
// Helpers
// =============================================================================

const ALICE = `0x${"a".repeat(40)}`;
const APPENDED_AT = "2024-01-15T10:00:01.000Z";

function pairEvent(type: string, tokenId: number): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}-${String(tokenId)}`,
      timestamp: "2024-01-15T10:00:00.000Z",
      actor: ALICE,
      correlationId: `op-${String(tokenId)}`,
      source: "engine",
    },
    payload: { owner: ALICE, tokenId, amount: "1000000" },
  };
}

const minted = (tokenId: number) => pairEvent(PAIR_EVENTS.PAIR_MINTED, tokenId);
const transferred = (tokenId: number) => pairEvent(PAIR_EVENTS.PAIR_TRANSFERRED, tokenId);
const burned = (tokenId: number) => pairEvent(PAIR_EVENTS.PAIR_BURNED, tokenId);

function pauseChanged(isPaused: boolean): DomainEvent {
  return {
    type: PAIR_EVENTS.PAUSE_CHANGED,
    metadata: {
      eventId: `evt-pause-${String(isPaused)}`,
      timestamp: "2024-01-15T10:00:00.000Z",
      actor: ALICE,
      correlationId: "op-pause",
      source: "engine",
    },
    payload: { isPaused },
  };
}

function newStore(onHandlerFailure?: (failure: HandlerFailure) => void): InMemoryEventStore {
  return new InMemoryEventStore({ clock: () => new Date(APPENDED_AT), onHandlerFailure });
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof EventStoreError ? err.code : "not an EventStoreError";
  }
  return undefined;
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("starts a pair stream at version 1", () => {
    const store = newStore();
    const stored = store.append(pairStreamId(0), minted(0), 0);

    expect(stored.streamId).toBe("pair-0");
    expect(stored.version).toBe(1);
    expect(stored.globalPosition).toBe(1);
    expect(stored.appendedAt).toBe(APPENDED_AT);
  });

  it("keeps independent stream versions and one global sequence", () => {
    const store = newStore();
    store.append("pair-0", minted(0), 0);
    store.append(ENGINE_STREAM, pauseChanged(true), 0);
    store.append("pair-0", transferred(0), 1);

    expect(store.read("pair-0").map((e) => e.version)).toEqual([1, 2]);
    expect(store.read(ENGINE_STREAM).map((e) => e.version)).toEqual([1]);
    expect(store.readAll().map((e) => e.globalPosition)).toEqual([1, 2, 3]);
    expect(store.streamVersion("pair-0")).toBe(2);
    expect(store.streamVersion("pair-7")).toBe(0);
    expect(store.globalPosition()).toBe(3);
  });

  it("stores the event body unchanged", () => {
    const store = newStore();
    const event = minted(4);
    store.append(pairStreamId(4), event, 0);

    const [stored] = store.read(pairStreamId(4));
    expect(stored?.event.type).toBe("pair.minted");
    expect(stored?.event.metadata).toEqual(event.metadata);
    expect(stored?.event.payload).toEqual({ owner: ALICE, tokenId: 4, amount: "1000000" });
  });
});

// =============================================================================
// Expected version
// =============================================================================

describe("expected version", () => {
  it("rejects a stale version and stores nothing", () => {
    const store = newStore();
    store.append("pair-0", minted(0), 0);

    try {
      store.append("pair-0", transferred(0), 0);
      expect.unreachable();
    } catch (err) {
      expect((err as EventStoreError).code).toBe("VERSION_CONFLICT");
      expect((err as EventStoreError).streamId).toBe("pair-0");
      expect((err as EventStoreError).message).toBe(
        'Stream "pair-0" is at version 1, expected 0',
      );
    }
    expect(store.globalPosition()).toBe(1);
  });

  it("rejects a version ahead of the stream", () => {
    const store = newStore();
    expect(codeOf(() => store.append("pair-0", minted(0), 1))).toBe("VERSION_CONFLICT");
  });

  it("is checked without storing by checkAppend", () => {
    const store = newStore();
    expect(() => store.checkAppend("pair-0", PAIR_EVENTS.PAIR_MINTED, 0)).not.toThrow();
    expect(codeOf(() => store.checkAppend("pair-0", PAIR_EVENTS.PAIR_MINTED, 3))).toBe(
      "VERSION_CONFLICT",
    );
    expect(store.globalPosition()).toBe(0);
  });
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("pair lifecycle", () => {
  it("accepts minted, transfers, then burned", () => {
    const store = newStore();
    store.append("pair-0", minted(0), 0);
    store.append("pair-0", transferred(0), 1);
    store.append("pair-0", transferred(0), 2);
    store.append("pair-0", burned(0), 3);

    expect(store.read("pair-0").map((e) => e.event.type)).toEqual([
      "pair.minted",
      "pair.transferred",
      "pair.transferred",
      "pair.burned",
    ]);
  });

  it("requires a pair stream to start with pair.minted", () => {
    const store = newStore();
    try {
      store.append("pair-0", transferred(0), 0);
      expect.unreachable();
    } catch (err) {
      expect((err as EventStoreError).code).toBe("LIFECYCLE_VIOLATION");
      expect((err as EventStoreError).category).toBe("invariant-violation");
      expect((err as EventStoreError).message).toBe(
        'Stream "pair-0" cannot start with pair.transferred',
      );
    }
  });

  it("closes a pair stream after pair.burned", () => {
    const store = newStore();
    store.append("pair-0", minted(0), 0);
    store.append("pair-0", burned(0), 1);

    expect(codeOf(() => store.append("pair-0", transferred(0), 2))).toBe("LIFECYCLE_VIOLATION");
    expect(codeOf(() => store.append("pair-0", minted(0), 2))).toBe("LIFECYCLE_VIOLATION");
  });

  it("rejects a second pair.minted", () => {
    const store = newStore();
    store.append("pair-0", minted(0), 0);
    expect(() => store.append("pair-0", minted(0), 1)).toThrow(
      'Stream "pair-0" cannot take pair.minted after pair.minted',
    );
  });

  it("keeps pair and engine events on their own streams", () => {
    const store = newStore();
    expect(codeOf(() => store.append(ENGINE_STREAM, minted(0), 0))).toBe("LIFECYCLE_VIOLATION");
    expect(codeOf(() => store.append("pair-0", pauseChanged(true), 0))).toBe(
      "LIFECYCLE_VIOLATION",
    );

    store.append(ENGINE_STREAM, pauseChanged(true), 0);
    store.append(ENGINE_STREAM, pauseChanged(true), 1);
    expect(store.streamVersion(ENGINE_STREAM)).toBe(2);
  });
});

// =============================================================================
// Stream identifiers
// =============================================================================

describe("stream identifiers", () => {
  it.each(["", "pair-", "pair-01", "pair--1", "pair-1.5", "Engine", "ledger"])(
    "rejects %j",
    (streamId) => {
      const store = newStore();
      expect(codeOf(() => store.append(streamId, minted(0), 0))).toBe("INVALID_STREAM_ID");
      expect(codeOf(() => store.read(streamId))).toBe("INVALID_STREAM_ID");
    },
  );

  it("rejects subscribing to an unknown stream", () => {
    expect(codeOf(() => newStore().subscribe("pairs", () => undefined))).toBe(
      "INVALID_STREAM_ID",
    );
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  function seeded(): InMemoryEventStore {
    const store = newStore();
    store.append("pair-0", minted(0), 0);
    store.append("pair-0", transferred(0), 1);
    store.append("pair-0", transferred(0), 2);
    store.append("pair-0", burned(0), 3);
    return store;
  }

  it("returns an empty array for a stream with no events", () => {
    expect(newStore().read("pair-9")).toEqual([]);
  });

  it("reads from a version with a limit", () => {
    const versions = seeded()
      .read("pair-0", { fromVersion: 2, maxCount: 2 })
      .map((e) => e.version);
    expect(versions).toEqual([2, 3]);
  });

  it("rejects fromVersion below 1", () => {
    expect(() => seeded().read("pair-0", { fromVersion: 0 })).toThrow(
      "fromVersion must be a positive integer, got 0",
    );
  });

  it("pages the global log by position", () => {
    const store = seeded();
    store.append(ENGINE_STREAM, pauseChanged(true), 0);

    const page = store.readAll({ fromPosition: 4, maxCount: 5 });
    expect(page.map((e) => `${e.streamId}@${String(e.globalPosition)}`)).toEqual([
      "pair-0@4",
      "engine@5",
    ]);
    expect(store.readAll({ fromPosition: 9 })).toEqual([]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events in order and stops after unsubscribe", () => {
    const store = newStore();
    const received: number[] = [];
    const sub = store.subscribe("pair-0", (e) => {
      received.push(e.version);
    });

    store.append("pair-0", minted(0), 0);
    store.append("pair-1", minted(1), 0);
    store.append("pair-0", transferred(0), 1);
    sub.unsubscribe();
    store.append("pair-0", burned(0), 2);

    expect(received).toEqual([1, 2]);
  });

  it("delivers every stream to global subscribers", () => {
    const store = newStore();
    const received: string[] = [];
    const sub = store.subscribeAll((e) => {
      received.push(`${e.streamId}:${e.event.type}`);
    });

    store.append("pair-0", minted(0), 0);
    store.append(ENGINE_STREAM, pauseChanged(false), 0);
    sub.unsubscribe();
    store.append(ENGINE_STREAM, pauseChanged(true), 1);

    expect(received).toEqual(["pair-0:pair.minted", "engine:engine.pause-changed"]);
  });

  it("keeps the event and the remaining subscribers when one throws", () => {
    const reported: HandlerFailure[] = [];
    const store = newStore((failure) => reported.push(failure));
    const failure = new Error("subscriber down");
    const received: number[] = [];
    store.subscribe("pair-0", () => {
      throw failure;
    });
    store.subscribeAll((e) => {
      received.push(e.globalPosition);
    });

    const stored = store.append("pair-0", minted(0), 0);

    expect(stored.version).toBe(1);
    expect(store.read("pair-0")).toHaveLength(1);
    expect(received).toEqual([1]);
    expect(reported).toEqual([{ streamId: "pair-0", globalPosition: 1, error: failure }]);
    expect(store.handlerFailures).toEqual(reported);
  });

  it("records subscriber failures without a reporter", () => {
    const store = newStore();
    store.subscribeAll(() => {
      throw new Error("subscriber down");
    });

    store.append(ENGINE_STREAM, pauseChanged(true), 0);
    store.append(ENGINE_STREAM, pauseChanged(false), 1);

    expect(store.handlerFailures.map((f) => f.globalPosition)).toEqual([1, 2]);
  });

  it("queues appends made by a subscriber behind the event being delivered", () => {
    const store = newStore();
    const seen: string[] = [];
    store.subscribe("pair-0", (e) => {
      if (e.event.type === PAIR_EVENTS.PAIR_MINTED) {
        store.append("pair-0", transferred(0), 1);
      }
    });
    store.subscribeAll((e) => {
      seen.push(`${String(e.globalPosition)}:${e.event.type}`);
    });

    store.append("pair-0", minted(0), 0);

    expect(seen).toEqual(["1:pair.minted", "2:pair.transferred"]);
    expect(store.streamVersion("pair-0")).toBe(2);
  });
});
