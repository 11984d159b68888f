/**
 * @pairmint/engine — Types for the pairing engine.
 *
 * Rules:
 * - A pair record exists exactly while its collectible is minted
 * - Amounts are bigint base units; snapshots carry them as strings
 * - Fail-closed: every error aborts the whole operation
 */

import type {
  Address,
  CategorizedError,
  ErrorCategory,
  TokenId,
} from "@pairmint/types";
import type { AccessSnapshot } from "@pairmint/access";
import type { PairLedger, StablecoinLike } from "@pairmint/ledger";
import type { PairRegistry } from "@pairmint/registry";
import type { EventStore } from "@pairmint/event-store";

// =============================================================================
// Pair Records
// =============================================================================

/**
 * Liveness record for one pair, keyed by the collectible identifier.
 */
export interface PairRecord {
  readonly tokenId: TokenId;
  readonly exists: true;
  /** Address that paid the fee and received both halves */
  readonly mintedBy: Address;
  /** ISO 8601 */
  readonly mintedAt: string;
}

/**
 * A live pair as seen from outside: the record plus the collectible's
 * current owner and resolved metadata pointer.
 */
export interface PairView extends PairRecord {
  readonly owner: Address;
  readonly metadataPointer: string;
}

// =============================================================================
// Configuration
// =============================================================================

export interface PairingEngineConfig {
  /** The engine's own address. Holds the fee escrow and the minter role. */
  readonly address: Address;

  /** Receives the admin role on the engine's controller. */
  readonly admin: Address;

  /** Mint fee and burn refund, in stablecoin base units. Default: PAIR_UNIT */
  readonly fee?: bigint | undefined;
}

export interface PairingEngineDeps {
  readonly ledger: PairLedger;
  readonly registry: PairRegistry;
  readonly stablecoin: StablecoinLike;

  /** Where committed events are appended. Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore | undefined;

  /** Default: () => new Date() */
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Invariant Audit
// =============================================================================

export type InvariantViolationKind =
  | "missing-collectible"
  | "orphan-collectible"
  | "balance-mismatch"
  | "supply-mismatch"
  | "escrow-shortfall";

export interface InvariantViolation {
  readonly kind: InvariantViolationKind;
  readonly message: string;
  readonly tokenId?: TokenId;
  readonly account?: Address;
}

export interface InvariantReport {
  readonly holds: boolean;
  readonly livePairs: number;
  /** Stablecoin held at the engine's address */
  readonly escrow: bigint;
  readonly violations: readonly InvariantViolation[];
}

// =============================================================================
// Snapshot
// =============================================================================

export interface EngineSnapshot {
  readonly version: 1;
  readonly address: Address;
  /** Base units, as a decimal integer string */
  readonly fee: string;
  readonly pairs: readonly PairRecord[];
  readonly access: AccessSnapshot;
}

// =============================================================================
// Errors
// =============================================================================

export type PairingErrorCode =
  | "INVALID_METADATA_POINTER"
  | "ZERO_ADDRESS"
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "INVALID_CONFIG"
  | "NOT_OWNER"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INSUFFICIENT_ESCROW"
  | "PAIR_NOT_FOUND"
  | "INVARIANT_VIOLATION"
  | "REENTRANT_CALL";

const CATEGORY: Readonly<Record<PairingErrorCode, ErrorCategory>> = {
  INVALID_METADATA_POINTER: "validation",
  ZERO_ADDRESS: "validation",
  INVALID_ADDRESS: "validation",
  INVALID_AMOUNT: "validation",
  INVALID_CONFIG: "validation",
  NOT_OWNER: "authorization",
  INSUFFICIENT_BALANCE: "insufficient-resource",
  INSUFFICIENT_ALLOWANCE: "insufficient-resource",
  INSUFFICIENT_ESCROW: "insufficient-resource",
  PAIR_NOT_FOUND: "invariant-violation",
  INVARIANT_VIOLATION: "invariant-violation",
  REENTRANT_CALL: "operational-state",
};

/**
 * Structured error from the pairing engine. Authorization and pause
 * failures surface as AccessError from the engine's controller.
 */
export class PairingError extends Error implements CategorizedError {
  public readonly code: PairingErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: PairingErrorCode, message: string) {
    super(message);
    this.name = "PairingError";
    this.code = code;
    this.category = CATEGORY[code];
  }
}
