/**
 * @pairmint/ledger — Types for the fungible ledger and stablecoin.
 *
 * Rules:
 * - All amounts are bigint base units
 * - Snapshots carry amounts as decimal strings so they survive JSON
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type {
  Address,
  CategorizedError,
  Checkpointable,
  ErrorCategory,
} from "@pairmint/types";
import type { AccessSnapshot } from "@pairmint/access";

// ─── Token Capabilities ──────────────────────────────────────────────────

/**
 * Minimal fungible-transfer capability. Anything the pairing engine can
 * sweep out of custody implements this.
 */
export interface TransferableToken {
  readonly symbol: string;
  readonly decimals: number;
  balanceOf(account: Address): bigint;

  /** Move `amount` from `sender` to `to`. Throws on failure. */
  transfer(sender: Address, to: Address, amount: bigint): void;
}

/**
 * The stablecoin the pairing fee is paid in.
 */
export interface StablecoinLike extends TransferableToken {
  allowance(owner: Address, spender: Address): bigint;

  /** Spend `spender`'s allowance to move `amount` from `from` to `to`. Throws on failure. */
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void;
}

/**
 * The pair's fungible half, as the engine sees it.
 */
export interface PairLedger extends Checkpointable<FungibleLedgerSnapshot> {
  readonly decimals: number;
  balanceOf(account: Address): bigint;
  totalSupply(): bigint;
  holders(): readonly Address[];
  mint(caller: Address, to: Address, amount: bigint): void;
  burn(caller: Address, from: Address, amount: bigint): void;
  transfer(caller: Address, from: Address, to: Address, amount: bigint): void;
}

// ─── Snapshots ───────────────────────────────────────────────────────────

export interface BalanceBookSnapshot {
  /** [address, base-unit amount] pairs, zero balances omitted. */
  readonly balances: readonly (readonly [Address, string])[];
}

export interface FungibleLedgerSnapshot extends BalanceBookSnapshot {
  readonly version: 1;
  readonly access: AccessSnapshot;
}

export interface StablecoinSnapshot extends BalanceBookSnapshot {
  readonly version: 1;
  readonly allowances: readonly (readonly [Address, Address, string])[];
}

// ─── Hooks ───────────────────────────────────────────────────────────────

/**
 * Called after every stablecoin balance movement. A hook that throws
 * aborts the movement.
 */
export type TransferHook = (from: Address, to: Address, amount: bigint) => void;

// ─── Error Types ─────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "ZERO_ADDRESS"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "UNAUTHORIZED";

const CATEGORY: Readonly<Record<LedgerErrorCode, ErrorCategory>> = {
  INVALID_AMOUNT: "validation",
  INVALID_ADDRESS: "validation",
  ZERO_ADDRESS: "validation",
  INSUFFICIENT_BALANCE: "insufficient-resource",
  INSUFFICIENT_ALLOWANCE: "insufficient-resource",
  UNAUTHORIZED: "authorization",
};

/**
 * Structured error from the ledger and stablecoin.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error implements CategorizedError {
  public readonly code: LedgerErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.category = CATEGORY[code];
  }
}
