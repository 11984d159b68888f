/**
 * Shared deployment fixture for engine tests.
 */

import { PAIR_UNIT, isCategorizedError } from "@pairmint/types";
import type { Address } from "@pairmint/types";
import { FungibleLedger, InMemoryStablecoin } from "@pairmint/ledger";
import { CollectibleRegistry } from "@pairmint/registry";
import { InMemoryEventStore } from "@pairmint/event-store";
import { PairingEngine } from "../src/pairing-engine.js";
import type { PairingEngineDeps } from "../src/types.js";

export const ADMIN: Address = `0x${"ad".repeat(20)}`;
export const ENGINE: Address = `0x${"e1".repeat(20)}`;
export const ALICE: Address = `0x${"a".repeat(40)}`;
export const BOB: Address = `0x${"b".repeat(40)}`;
export const CAROL: Address = `0x${"c".repeat(40)}`;

export const NOW = "2024-01-15T10:00:00.000Z";

export interface Deployment {
  readonly engine: PairingEngine;
  readonly ledger: FungibleLedger;
  readonly registry: CollectibleRegistry;
  readonly stablecoin: InMemoryStablecoin;
  readonly eventStore: InMemoryEventStore;
  readonly deps: PairingEngineDeps;
}

/**
 * Wire one engine over fresh capabilities, with the minter role granted.
 */
export function deploy(options: { fee?: bigint } = {}): Deployment {
  const ledger = new FungibleLedger({ symbol: "PAIR", admin: ADMIN });
  const registry = new CollectibleRegistry({ name: "Pairs", admin: ADMIN });
  const stablecoin = new InMemoryStablecoin({ symbol: "USDC", owner: ADMIN });
  const eventStore = new InMemoryEventStore();
  const deps: PairingEngineDeps = {
    ledger,
    registry,
    stablecoin,
    eventStore,
    clock: () => new Date(NOW),
  };

  const engine = new PairingEngine({ address: ENGINE, admin: ADMIN, fee: options.fee }, deps);
  ledger.access.grantRole(ADMIN, "minter", ENGINE);
  registry.access.grantRole(ADMIN, "minter", ENGINE);

  return { engine, ledger, registry, stablecoin, eventStore, deps };
}

/**
 * Give `account` stablecoin and approve the engine for the same amount.
 */
export function fund(d: Deployment, account: Address, amount: bigint = PAIR_UNIT): void {
  d.stablecoin.mint(ADMIN, account, amount);
  d.stablecoin.approve(account, ENGINE, d.stablecoin.allowance(account, ENGINE) + amount);
}

/**
 * The error a call throws, for asserting on code and message.
 */
export function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

/**
 * Code of the structured error a call throws.
 */
export function codeOf(fn: () => unknown): string | undefined {
  const err = caught(fn);
  return isCategorizedError(err) ? err.code : undefined;
}
