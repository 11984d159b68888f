/**
 * @pairmint/ledger — Fungible ledger (the pair's balance token).
 *
 * API surface:
 * - mint() / burn() / transfer() — minter capability only (the pairing engine)
 * - balanceOf() / totalSupply() / holders() — queries
 * - snapshot() / restore() — checkpointing
 *
 * End holders have no transfer entry point of their own. Every movement
 * goes through a caller holding the minter role, so the fungible half of
 * a pair can never move without the collectible half.
 */

import type { Address } from "@pairmint/types";
import { TOKEN_DECIMALS } from "@pairmint/types";
import { AccessController } from "@pairmint/access";
import { BalanceBook } from "./balance-book.js";
import { assertPositive, assertRecipient } from "./amount-math.js";
import type { FungibleLedgerSnapshot, PairLedger } from "./types.js";

export interface FungibleLedgerConfig {
  readonly symbol: string;
  readonly admin: Address;
}

export class FungibleLedger implements PairLedger {
  readonly symbol: string;
  readonly decimals: number = TOKEN_DECIMALS;
  readonly access: AccessController;
  private readonly _book: BalanceBook;

  constructor(config: FungibleLedgerConfig) {
    this.symbol = config.symbol;
    this.access = new AccessController(`ledger(${config.symbol})`, config.admin);
    this._book = new BalanceBook(`ledger(${config.symbol})`);
  }

  // ─── Queries ───────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this._book.balanceOf(account);
  }

  totalSupply(): bigint {
    return this._book.totalSupply;
  }

  holders(): readonly Address[] {
    return this._book.holders();
  }

  // ─── Privileged Mutations ──────────────────────────────────────────

  mint(caller: Address, to: Address, amount: bigint): void {
    this.access.assertNotPaused();
    this.access.assertCan(caller, "mint");
    assertRecipient(to, "mint");
    assertPositive(amount, "mint");

    this._book.issue(to, amount);
  }

  /**
   * Burn from a holder. Fails with INSUFFICIENT_BALANCE when the holder
   * has less than `amount`.
   */
  burn(caller: Address, from: Address, amount: bigint): void {
    this.access.assertNotPaused();
    this.access.assertCan(caller, "burn");
    assertPositive(amount, "burn");

    this._book.retire(from, amount);
  }

  transfer(caller: Address, from: Address, to: Address, amount: bigint): void {
    this.access.assertNotPaused();
    this.access.assertCan(caller, "transfer");
    assertRecipient(to, "transfer");
    assertPositive(amount, "transfer");

    this._book.move(from, to, amount);
  }

  // ─── Snapshot ──────────────────────────────────────────────────────

  snapshot(): FungibleLedgerSnapshot {
    return {
      version: 1,
      access: this.access.snapshot(),
      ...this._book.snapshot(),
    };
  }

  restore(snapshot: FungibleLedgerSnapshot): void {
    this.access.restore(snapshot.access);
    this._book.restore(snapshot);
  }
}
