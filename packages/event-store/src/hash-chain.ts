/**
 * @pairmint/event-store — Hash links between stored events.
 *
 * An event's hash covers its RFC 8785 canonical record together with the
 * hash of the event before it in global order:
 *
 *   hash = sha256(canonicalize({ previousHash, record }))
 *
 * so altering, dropping or reordering any event breaks every link after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { EventStoreIntegrityResult, IntegrityError, StoredEvent } from "./types.js";

/** `previousHash` of the event at global position 1. */
export const CHAIN_ORIGIN = "0".repeat(64);

export type UnlinkedEvent = Omit<StoredEvent, "hash" | "previousHash">;

export function linkHash(record: UnlinkedEvent, previousHash: string): string {
  const content = canonicalize({
    previousHash,
    record: {
      streamId: record.streamId,
      version: record.version,
      globalPosition: record.globalPosition,
      appendedAt: record.appendedAt,
      event: record.event,
    },
  });
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Walk a global log from position 1 and report every broken link,
 * position gap and hash that no longer matches its record.
 */
export function verifyChain(log: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = CHAIN_ORIGIN;
  let lastVerifiedPosition = 0;

  for (const [index, stored] of log.entries()) {
    const position = stored.globalPosition;
    if (position !== index + 1) {
      errors.push({ position, reason: `position ${String(position)} found at index ${String(index)}` });
    }
    if (stored.previousHash !== expectedPrevious) {
      errors.push({ position, reason: `position ${String(position)} does not link to its predecessor` });
    }
    if (stored.hash !== linkHash(stored, stored.previousHash)) {
      errors.push({ position, reason: `position ${String(position)} does not match its hash` });
    }
    if (errors.length === 0) {
      lastVerifiedPosition = position;
    }
    expectedPrevious = stored.hash;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
