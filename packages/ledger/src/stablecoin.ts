/**
 * @pairmint/ledger — In-memory stablecoin.
 *
 * A standard fungible-transfer token (balances + allowances) used as the
 * fee currency in tests and in the HTTP node. Holders move their own
 * funds; only the owner can mint new supply.
 *
 * Not a capability of the pairing engine: the engine only sees it through
 * StablecoinLike, and checkpoints it opportunistically.
 */

import type { Address } from "@pairmint/types";
import { TOKEN_DECIMALS, canonicalAddress } from "@pairmint/types";
import { BalanceBook } from "./balance-book.js";
import { assertPositive, assertRecipient } from "./amount-math.js";
import type { StablecoinLike, StablecoinSnapshot, TransferHook } from "./types.js";
import { LedgerError } from "./types.js";

export interface StablecoinConfig {
  readonly symbol: string;
  readonly owner: Address;
  readonly decimals?: number | undefined;
}

export class InMemoryStablecoin implements StablecoinLike {
  readonly symbol: string;
  readonly decimals: number;
  readonly owner: Address;
  private readonly _book: BalanceBook;
  private readonly _allowances: Map<Address, Map<Address, bigint>> = new Map();
  private readonly _hooks: Set<TransferHook> = new Set();

  constructor(config: StablecoinConfig) {
    assertRecipient(config.owner, "stablecoin owner");
    this.symbol = config.symbol;
    this.owner = canonicalAddress(config.owner);
    this.decimals = config.decimals ?? TOKEN_DECIMALS;
    this._book = new BalanceBook(config.symbol);
  }

  // ─── Queries ───────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this._book.balanceOf(account);
  }

  totalSupply(): bigint {
    return this._book.totalSupply;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(canonicalAddress(owner))?.get(canonicalAddress(spender)) ?? 0n;
  }

  // ─── Mutations ─────────────────────────────────────────────────────

  mint(caller: Address, to: Address, amount: bigint): void {
    if (canonicalAddress(caller) !== this.owner) {
      throw new LedgerError("UNAUTHORIZED", `${this.symbol}: only the owner can mint`);
    }
    assertRecipient(to, `${this.symbol} mint`);
    assertPositive(amount, `${this.symbol} mint`);
    this._book.issue(to, amount);
  }

  /**
   * Set (not add to) the allowance `owner` grants `spender`. Zero revokes.
   */
  approve(owner: Address, spender: Address, amount: bigint): void {
    assertRecipient(spender, `${this.symbol} approve`);
    if (amount < 0n) {
      throw new LedgerError("INVALID_AMOUNT", `${this.symbol}: allowance cannot be negative`);
    }

    const holder = canonicalAddress(owner);
    let granted = this._allowances.get(holder);
    if (granted === undefined) {
      granted = new Map();
      this._allowances.set(holder, granted);
    }
    if (amount === 0n) {
      granted.delete(canonicalAddress(spender));
    } else {
      granted.set(canonicalAddress(spender), amount);
    }
  }

  transfer(sender: Address, to: Address, amount: bigint): void {
    assertRecipient(to, `${this.symbol} transfer`);
    assertPositive(amount, `${this.symbol} transfer`);
    this._move(sender, to, amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    assertRecipient(to, `${this.symbol} transferFrom`);
    assertPositive(amount, `${this.symbol} transferFrom`);

    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `${this.symbol}: allowance of ${spender} from ${from} is ${allowed.toString()}, needs ${amount.toString()}`,
      );
    }
    this._book.assertCovers(from, amount);

    this._move(from, to, amount);
    this.approve(from, spender, allowed - amount);
  }

  // ─── Hooks ─────────────────────────────────────────────────────────

  /**
   * Register a callback run after each balance movement.
   *
   * @returns a function that removes the hook
   */
  onTransfer(hook: TransferHook): () => void {
    this._hooks.add(hook);
    return () => {
      this._hooks.delete(hook);
    };
  }

  // ─── Snapshot ──────────────────────────────────────────────────────

  snapshot(): StablecoinSnapshot {
    const allowances: (readonly [Address, Address, string])[] = [];
    for (const [owner, granted] of this._allowances) {
      for (const [spender, amount] of granted) {
        allowances.push([owner, spender, amount.toString()]);
      }
    }
    return { version: 1, ...this._book.snapshot(), allowances };
  }

  restore(snapshot: StablecoinSnapshot): void {
    this._book.restore(snapshot);
    this._allowances.clear();
    for (const [owner, spender, amount] of snapshot.allowances) {
      this.approve(owner, spender, BigInt(amount));
    }
  }

  // ─── Internal ──────────────────────────────────────────────────────

  /**
   * Move funds, then run hooks. A throwing hook undoes the movement.
   */
  private _move(from: Address, to: Address, amount: bigint): void {
    const before = this._book.snapshot();
    this._book.move(from, to, amount);
    try {
      for (const hook of this._hooks) {
        hook(from, to, amount);
      }
    } catch (err) {
      this._book.restore(before);
      throw err;
    }
  }
}
