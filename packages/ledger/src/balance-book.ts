/**
 * @pairmint/ledger — Balance book.
 *
 * Per-address balances plus total supply, shared by the fungible ledger
 * and the in-memory stablecoin. Knows nothing about authorization.
 *
 * Rules:
 * - Balances never go negative
 * - Zero balances are dropped from the map
 * - totalSupply always equals the sum of balances
 * - Keys are canonical (lowercase) addresses
 */

import type { Address } from "@pairmint/types";
import { canonicalAddress } from "@pairmint/types";
import type { BalanceBookSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

export class BalanceBook {
  private readonly _balances: Map<Address, bigint> = new Map();
  private _totalSupply = 0n;

  constructor(private readonly label: string) {}

  balanceOf(account: Address): bigint {
    return this._balances.get(canonicalAddress(account)) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  /** Addresses with a non-zero balance. */
  holders(): readonly Address[] {
    return [...this._balances.keys()];
  }

  /**
   * Throw INSUFFICIENT_BALANCE unless `account` holds at least `amount`.
   */
  assertCovers(account: Address, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `${this.label}: balance of ${account} is ${balance.toString()}, needs ${amount.toString()}`,
      );
    }
  }

  /** Create `amount` out of nothing for `account`. */
  issue(account: Address, amount: bigint): void {
    this._balances.set(canonicalAddress(account), this.balanceOf(account) + amount);
    this._totalSupply += amount;
  }

  /** Destroy `amount` held by `account`. */
  retire(account: Address, amount: bigint): void {
    this.assertCovers(account, amount);
    this._setBalance(account, this.balanceOf(account) - amount);
    this._totalSupply -= amount;
  }

  move(from: Address, to: Address, amount: bigint): void {
    this.assertCovers(from, amount);
    if (canonicalAddress(from) === canonicalAddress(to)) {
      return;
    }
    this._setBalance(from, this.balanceOf(from) - amount);
    this._setBalance(to, this.balanceOf(to) + amount);
  }

  // ─── Snapshot ──────────────────────────────────────────────────────

  snapshot(): BalanceBookSnapshot {
    return {
      balances: [...this._balances].map(
        ([account, amount]) => [account, amount.toString()] as const,
      ),
    };
  }

  restore(snapshot: BalanceBookSnapshot): void {
    this._balances.clear();
    this._totalSupply = 0n;
    for (const [account, amount] of snapshot.balances) {
      this.issue(account, BigInt(amount));
    }
  }

  private _setBalance(account: Address, amount: bigint): void {
    const key = canonicalAddress(account);
    if (amount === 0n) {
      this._balances.delete(key);
    } else {
      this._balances.set(key, amount);
    }
  }
}
