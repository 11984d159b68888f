/**
 * @pairmint/types — Shared domain types for the pairmint stack.
 *
 * These types are used across all pairmint packages:
 * - Addresses, token identifiers and fixed amounts
 * - Event architecture
 * - Checkpointing for atomic multi-component operations
 * - Error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Chain primitives
export type { Address, TokenId } from "./chain.js";
export { ZERO_ADDRESS, TOKEN_DECIMALS, PAIR_UNIT, canonicalAddress } from "./chain.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Checkpointing
export type { Checkpointable } from "./checkpoint.js";
export { isCheckpointable } from "./checkpoint.js";

// Error taxonomy
export type { ErrorCategory, CategorizedError } from "./errors.js";

// Runtime type guards
export {
  isAddress,
  isNonZeroAddress,
  isBaseUnitString,
  isEventMetadata,
  isDomainEvent,
  isErrorCategory,
  isCategorizedError,
} from "./guards.js";
