/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, restored snapshots, foreign error objects).
 */

import type { Address } from "./chain.js";
import { ZERO_ADDRESS, canonicalAddress } from "./chain.js";
import type { DomainEvent, EventMetadata } from "./event.js";
import type { CategorizedError, ErrorCategory } from "./errors.js";

// =============================================================================
// Address guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/** A well-formed address other than the zero address. */
export function isNonZeroAddress(value: unknown): value is Address {
  return isAddress(value) && canonicalAddress(value) !== ZERO_ADDRESS;
}

/** Base-unit amount as a non-negative integer string ("1000000"). */
export function isBaseUnitString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["engine", "ledger", "registry", "access"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

// =============================================================================
// Error guards
// =============================================================================

const ERROR_CATEGORIES = new Set<string>([
  "validation",
  "authorization",
  "insufficient-resource",
  "invariant-violation",
  "operational-state",
]);

export function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === "string" && ERROR_CATEGORIES.has(value);
}

export function isCategorizedError(value: unknown): value is CategorizedError {
  if (!(value instanceof Error)) return false;
  const v = value as Error & Record<string, unknown>;
  return typeof v.code === "string" && isErrorCategory(v.category);
}
