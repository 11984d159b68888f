/**
 * @pairmint/ledger — Fungible balances for the pair token and the fee stablecoin.
 *
 * Provides:
 * - FungibleLedger: the pair's fungible half, mutable only by the minter role
 * - InMemoryStablecoin: a standard fee token (balances + allowances)
 * - Deterministic bigint amount arithmetic
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Fail-closed: invalid operations throw, never silently succeed
 * - A failed operation leaves every balance untouched
 */

export { FungibleLedger } from "./fungible-ledger.js";
export type { FungibleLedgerConfig } from "./fungible-ledger.js";

export { InMemoryStablecoin } from "./stablecoin.js";
export type { StablecoinConfig } from "./stablecoin.js";

export { BalanceBook } from "./balance-book.js";

export {
  parseAmount,
  formatAmount,
  assertPositive,
  assertRecipient,
} from "./amount-math.js";

export type {
  TransferableToken,
  StablecoinLike,
  PairLedger,
  BalanceBookSnapshot,
  FungibleLedgerSnapshot,
  StablecoinSnapshot,
  TransferHook,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
