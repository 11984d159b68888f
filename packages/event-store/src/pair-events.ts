/**
 * @pairmint/event-store — Pairing domain event definitions.
 *
 * Naming convention: `<subsystem>.<action>`
 *
 * Streams:
 * - `pair-<tokenId>`: the lifecycle of one pair (minted, transferred*, burned)
 * - `engine`: administrative events, in any order
 *
 * Amounts are base-unit integer strings so payloads stay plain JSON.
 */

import type { TokenId } from "@pairmint/types";

export const PAIR_EVENTS = {
  PAIR_MINTED: "pair.minted",
  PAIR_BURNED: "pair.burned",
  PAIR_TRANSFERRED: "pair.transferred",
  EMERGENCY_WITHDRAWAL: "engine.emergency-withdrawal",
  PAUSE_CHANGED: "engine.pause-changed",
} as const;

export type PairEventType = (typeof PAIR_EVENTS)[keyof typeof PAIR_EVENTS];

export const ENGINE_STREAM = "engine";

export function pairStreamId(tokenId: TokenId): string {
  return `pair-${String(tokenId)}`;
}

const PAIR_STREAM_PATTERN = /^pair-(0|[1-9][0-9]*)$/;

export type StreamKind = "pair" | "engine";

/** Kind of a stream identifier, or undefined if it names no stream. */
export function streamKind(streamId: string): StreamKind | undefined {
  if (streamId === ENGINE_STREAM) {
    return "engine";
  }
  return PAIR_STREAM_PATTERN.test(streamId) ? "pair" : undefined;
}

// =============================================================================
// Lifecycle
// =============================================================================

const PAIR_NEXT: ReadonlyMap<string | undefined, readonly PairEventType[]> = new Map<
  string | undefined,
  readonly PairEventType[]
>([
  [undefined, [PAIR_EVENTS.PAIR_MINTED]],
  [PAIR_EVENTS.PAIR_MINTED, [PAIR_EVENTS.PAIR_TRANSFERRED, PAIR_EVENTS.PAIR_BURNED]],
  [PAIR_EVENTS.PAIR_TRANSFERRED, [PAIR_EVENTS.PAIR_TRANSFERRED, PAIR_EVENTS.PAIR_BURNED]],
  [PAIR_EVENTS.PAIR_BURNED, []],
]);

const ENGINE_TYPES: readonly PairEventType[] = [
  PAIR_EVENTS.PAUSE_CHANGED,
  PAIR_EVENTS.EMERGENCY_WITHDRAWAL,
];

/**
 * Event types a stream accepts next, given the type of its last event
 * (undefined for an empty stream).
 */
export function acceptedNext(kind: StreamKind, head: string | undefined): readonly PairEventType[] {
  if (kind === "engine") {
    return ENGINE_TYPES;
  }
  return PAIR_NEXT.get(head) ?? [];
}

// =============================================================================
// Payloads
// =============================================================================

export interface PairMintedPayload {
  readonly owner: string;
  readonly tokenId: TokenId;
  readonly amount: string;
  readonly metadataPointer: string;
  readonly fee: string;
}

export interface PairBurnedPayload {
  readonly owner: string;
  readonly tokenId: TokenId;
  readonly amount: string;
  readonly refund: string;
}

export interface PairTransferredPayload {
  readonly from: string;
  readonly to: string;
  readonly tokenId: TokenId;
  readonly amount: string;
}

export interface EmergencyWithdrawalPayload {
  /** Symbol of the withdrawn token */
  readonly token: string;
  readonly to: string;
  readonly amount: string;
}

export interface PauseChangedPayload {
  readonly isPaused: boolean;
}

/**
 * Map from event type to payload, for typed consumers.
 */
export interface PairEventPayloads {
  readonly "pair.minted": PairMintedPayload;
  readonly "pair.burned": PairBurnedPayload;
  readonly "pair.transferred": PairTransferredPayload;
  readonly "engine.emergency-withdrawal": EmergencyWithdrawalPayload;
  readonly "engine.pause-changed": PauseChangedPayload;
}
