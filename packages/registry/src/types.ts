/**
 * @pairmint/registry — Types for the collectible registry.
 *
 * Rules:
 * - Identifiers are assigned sequentially from 0 and never reused
 * - Every live token has exactly one owner and one metadata pointer
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type {
  Address,
  CategorizedError,
  Checkpointable,
  ErrorCategory,
  TokenId,
} from "@pairmint/types";
import type { AccessSnapshot } from "@pairmint/access";

// ─── Records ─────────────────────────────────────────────────────────────

export interface CollectibleRecord {
  readonly tokenId: TokenId;
  /** Canonical (lowercase) spelling */
  readonly owner: Address;
  /** Pointer as minted, without the base pointer. */
  readonly metadataPointer: string;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

export interface RegistrySnapshot {
  readonly version: 1;
  readonly nextTokenId: TokenId;
  readonly baseMetadataPointer: string;
  readonly tokens: readonly CollectibleRecord[];
  readonly access: AccessSnapshot;
}

// ─── Capability ──────────────────────────────────────────────────────────

/**
 * The pair's collectible half, as the engine sees it.
 */
export interface PairRegistry extends Checkpointable<RegistrySnapshot> {
  exists(tokenId: TokenId): boolean;
  ownerOf(tokenId: TokenId): Address;
  metadataPointerOf(tokenId: TokenId): string;
  tokenIds(): readonly TokenId[];
  readonly nextTokenId: TokenId;
  mint(caller: Address, to: Address, metadataPointer: string): TokenId;
  burn(caller: Address, holder: Address, tokenId: TokenId): void;
  transfer(caller: Address, from: Address, to: Address, tokenId: TokenId): void;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type RegistryErrorCode =
  | "INVALID_METADATA_POINTER"
  | "INVALID_ADDRESS"
  | "ZERO_ADDRESS"
  | "TOKEN_NOT_FOUND"
  | "NOT_OWNER";

const CATEGORY: Readonly<Record<RegistryErrorCode, ErrorCategory>> = {
  INVALID_METADATA_POINTER: "validation",
  INVALID_ADDRESS: "validation",
  ZERO_ADDRESS: "validation",
  TOKEN_NOT_FOUND: "invariant-violation",
  NOT_OWNER: "authorization",
};

/**
 * Structured error from the collectible registry.
 */
export class RegistryError extends Error implements CategorizedError {
  public readonly code: RegistryErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.category = CATEGORY[code];
  }
}
