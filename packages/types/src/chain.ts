/**
 * Chain Types
 *
 * Address and amount primitives shared by every component.
 *
 * Rules:
 * - Addresses are 0x-prefixed, 40 hex digits
 * - Amounts are bigint base units (no floating point)
 * - The pair unit and the stablecoin share the same 6-decimal precision
 */

/**
 * An account address (e.g. "0x1f...c4").
 */
export type Address = string;

/**
 * The zero address. Never a valid recipient or caller.
 */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * Lowercase spelling of an address. Spellings that differ only in letter
 * case name the same account, so every map key and comparison uses this.
 */
export function canonicalAddress(account: Address): Address {
  return account.toLowerCase();
}

/**
 * Decimal places of the pair token and the fee stablecoin.
 */
export const TOKEN_DECIMALS = 6;

/**
 * One fungible unit of a pair: 10^6 base units, i.e. "1.000000".
 */
export const PAIR_UNIT: bigint = 10n ** BigInt(TOKEN_DECIMALS);

/**
 * Non-fungible collectible identifier. Assigned sequentially from 0.
 */
export type TokenId = number;
