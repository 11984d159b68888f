/**
 * @pairmint/ledger — Deterministic amount arithmetic.
 *
 * Amounts live as bigint base units. Decimal strings only appear at the
 * edges (configuration, HTTP bodies, display).
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 */

import type { Address } from "@pairmint/types";
import { isAddress, isNonZeroAddress } from "@pairmint/types";
import { LedgerError } from "./types.js";

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "1.5" with decimals=6 → 1500000n
 * "2" with decimals=6 → 2000000n
 * "-0.25" with decimals=2 → -25n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 1500000n with decimals=6 → "1.500000"
 * -25n with decimals=2 → "-0.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Throw unless the amount is strictly positive.
 */
export function assertPositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label}: amount must be positive, got ${amount.toString()}`,
    );
  }
}

/**
 * Throw unless the address is well-formed and not the zero address.
 */
export function assertRecipient(account: Address, label: string): void {
  if (!isAddress(account)) {
    throw new LedgerError("INVALID_ADDRESS", `${label}: invalid address "${account}"`);
  }
  if (!isNonZeroAddress(account)) {
    throw new LedgerError("ZERO_ADDRESS", `${label}: zero address not allowed`);
  }
}
