/**
 * Tests for InMemoryStablecoin.
 *
 * Covers:
 * - Owner-only minting
 * - transfer / approve / transferFrom
 * - Transfer hooks (observation and abort)
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { InMemoryStablecoin } from "../src/stablecoin.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const OWNER = `0x${"0f".repeat(20)}`;
const ALICE = `0x${"a".repeat(40)}`;
const BOB = `0x${"b".repeat(40)}`;
const SPENDER = `0x${"e1".repeat(20)}`;

function codeOf(fn: () => void): string | undefined {
  try {
    fn();
  } catch (err) {
    return (err as LedgerError).code;
  }
  return undefined;
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("InMemoryStablecoin", () => {
  let usdc: InMemoryStablecoin;

  beforeEach(() => {
    usdc = new InMemoryStablecoin({ symbol: "USDC", owner: OWNER });
    usdc.mint(OWNER, ALICE, 2_000_000n);
  });

  it("defaults to 6 decimals", () => {
    expect(usdc.decimals).toBe(6);
    expect(usdc.totalSupply()).toBe(2_000_000n);
  });

  it("only the owner mints", () => {
    expect(codeOf(() => usdc.mint(ALICE, ALICE, 1n))).toBe("UNAUTHORIZED");
  });

  describe("transfer", () => {
    it("moves the sender's funds", () => {
      usdc.transfer(ALICE, BOB, 500_000n);
      expect(usdc.balanceOf(ALICE)).toBe(1_500_000n);
      expect(usdc.balanceOf(BOB)).toBe(500_000n);
    });

    it("fails on insufficient balance", () => {
      expect(codeOf(() => usdc.transfer(BOB, ALICE, 1n))).toBe("INSUFFICIENT_BALANCE");
    });
  });

  describe("transferFrom", () => {
    it("spends allowance", () => {
      usdc.approve(ALICE, SPENDER, 1_500_000n);
      usdc.transferFrom(SPENDER, ALICE, SPENDER, 1_000_000n);
      expect(usdc.balanceOf(SPENDER)).toBe(1_000_000n);
      expect(usdc.allowance(ALICE, SPENDER)).toBe(500_000n);
    });

    it("fails without allowance and leaves balances untouched", () => {
      expect(codeOf(() => usdc.transferFrom(SPENDER, ALICE, SPENDER, 1n))).toBe(
        "INSUFFICIENT_ALLOWANCE",
      );
      expect(usdc.balanceOf(ALICE)).toBe(2_000_000n);
    });

    it("fails on insufficient balance and keeps the allowance", () => {
      usdc.approve(ALICE, SPENDER, 5_000_000n);
      expect(codeOf(() => usdc.transferFrom(SPENDER, ALICE, SPENDER, 3_000_000n))).toBe(
        "INSUFFICIENT_BALANCE",
      );
      expect(usdc.allowance(ALICE, SPENDER)).toBe(5_000_000n);
    });
  });

  describe("approve", () => {
    it("overwrites and revokes", () => {
      usdc.approve(ALICE, SPENDER, 10n);
      usdc.approve(ALICE, SPENDER, 3n);
      expect(usdc.allowance(ALICE, SPENDER)).toBe(3n);
      usdc.approve(ALICE, SPENDER, 0n);
      expect(usdc.allowance(ALICE, SPENDER)).toBe(0n);
    });

    it("rejects negative allowances", () => {
      expect(() => usdc.approve(ALICE, SPENDER, -1n)).toThrow(LedgerError);
    });
  });

  describe("hooks", () => {
    it("observes every movement", () => {
      const hook = vi.fn();
      usdc.onTransfer(hook);
      usdc.transfer(ALICE, BOB, 7n);
      expect(hook).toHaveBeenCalledWith(ALICE, BOB, 7n);
    });

    it("undoes the movement when a hook throws", () => {
      usdc.onTransfer(() => {
        throw new Error("hook refused");
      });
      expect(() => usdc.transfer(ALICE, BOB, 7n)).toThrow("hook refused");
      expect(usdc.balanceOf(ALICE)).toBe(2_000_000n);
      expect(usdc.balanceOf(BOB)).toBe(0n);
    });

    it("stops calling removed hooks", () => {
      const hook = vi.fn();
      const off = usdc.onTransfer(hook);
      off();
      usdc.transfer(ALICE, BOB, 1n);
      expect(hook).not.toHaveBeenCalled();
    });
  });

  describe("snapshot", () => {
    it("restores balances and allowances", () => {
      usdc.approve(ALICE, SPENDER, 9n);
      const snap = usdc.snapshot();
      expect(snap.allowances).toEqual([[ALICE, SPENDER, "9"]]);

      usdc.transfer(ALICE, BOB, 1_000_000n);
      usdc.approve(ALICE, SPENDER, 0n);
      usdc.restore(snap);

      expect(usdc.balanceOf(ALICE)).toBe(2_000_000n);
      expect(usdc.balanceOf(BOB)).toBe(0n);
      expect(usdc.allowance(ALICE, SPENDER)).toBe(9n);
    });
  });
});

describe("InMemoryStablecoin address spelling", () => {
  it("applies balances, allowances and ownership across letter case", () => {
    const coin = new InMemoryStablecoin({ symbol: "USDC", owner: `0x${"0F".repeat(20)}` });

    coin.mint(OWNER, `0x${"A".repeat(40)}`, 5n);
    coin.approve(ALICE, `0x${"E1".repeat(20)}`, 3n);
    coin.transferFrom(SPENDER, `0x${"A".repeat(40)}`, BOB, 2n);

    expect(coin.balanceOf(ALICE)).toBe(3n);
    expect(coin.balanceOf(BOB)).toBe(2n);
    expect(coin.allowance(`0x${"A".repeat(40)}`, SPENDER)).toBe(1n);
  });
});
