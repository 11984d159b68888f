/**
 * @pairmint/engine — Pairing engine.
 *
 * The only entry point that moves either half of a pair. Composes:
 * - PairLedger: the fungible half (one PAIR_UNIT per pair)
 * - PairRegistry: the collectible half
 * - StablecoinLike: the fee currency, escrowed at the engine's address
 * - EventStore: receives one event per committed operation
 *
 * Every paired operation runs in four stages: read-only precondition
 * checks (including whether the event stream accepts the event),
 * checkpoint of every participant, mutations with the stablecoin call
 * last, and finally the event append once the reentrancy lock is
 * released. Any failure before the append restores all checkpoints.
 *
 * Between operations, for every address:
 *   ledger.balanceOf(a) == PAIR_UNIT × |{ live pairs owned by a }|
 */

import { randomUUID } from "node:crypto";
import type { Address, DomainEvent, TokenId } from "@pairmint/types";
import {
  PAIR_UNIT,
  canonicalAddress,
  isAddress,
  isCheckpointable,
  isNonZeroAddress,
} from "@pairmint/types";
import { AccessController } from "@pairmint/access";
import type { Role } from "@pairmint/access";
import type { PairLedger, StablecoinLike, TransferableToken } from "@pairmint/ledger";
import type { PairRegistry } from "@pairmint/registry";
import { checkMetadataPointer } from "@pairmint/registry";
import type { EventStore } from "@pairmint/event-store";
import {
  ENGINE_STREAM,
  InMemoryEventStore,
  PAIR_EVENTS,
  pairStreamId,
} from "@pairmint/event-store";
import type {
  PairBurnedPayload,
  PairEventType,
  PairMintedPayload,
  PairTransferredPayload,
} from "@pairmint/event-store";
import { applyStaged, checkpoint, checkpointMap } from "./staged-apply.js";
import type { Checkpoint } from "./staged-apply.js";
import type {
  EngineSnapshot,
  InvariantReport,
  InvariantViolation,
  PairingEngineConfig,
  PairingEngineDeps,
  PairRecord,
  PairView,
} from "./types.js";
import { PairingError } from "./types.js";

interface PendingEvent {
  readonly streamId: string;
  readonly type: PairEventType;
  /** Stream version the event extends, checked before any mutation */
  readonly expectedVersion: number;
  readonly payload: Readonly<Record<string, unknown>>;
}

/** What a guarded operation returns: its result and the event to record. */
interface Outcome<T> {
  readonly result: T;
  readonly actor: Address;
  readonly event: PendingEvent;
}

export class PairingEngine {
  readonly address: Address;

  private readonly _access: AccessController;
  private readonly _fee: bigint;
  private readonly _ledger: PairLedger;
  private readonly _registry: PairRegistry;
  private readonly _stablecoin: StablecoinLike;
  private readonly _events: EventStore;
  private readonly _clock: () => Date;
  private readonly _pairs: Map<TokenId, PairRecord> = new Map();

  /** Set while a paired operation mutates state, cleared before its event is appended. */
  private _locked = false;

  constructor(config: PairingEngineConfig, deps: PairingEngineDeps) {
    if (!isNonZeroAddress(config.address)) {
      throw new PairingError("INVALID_CONFIG", `engine: invalid engine address "${config.address}"`);
    }
    if (!isNonZeroAddress(config.admin)) {
      throw new PairingError("INVALID_CONFIG", `engine: invalid admin address "${config.admin}"`);
    }
    const fee = config.fee ?? PAIR_UNIT;
    if (fee <= 0n) {
      throw new PairingError("INVALID_CONFIG", `engine: fee must be positive, got ${fee.toString()}`);
    }

    this.address = canonicalAddress(config.address);
    this._access = new AccessController("engine", config.admin);
    this._fee = fee;
    this._ledger = deps.ledger;
    this._registry = deps.registry;
    this._stablecoin = deps.stablecoin;
    this._events = deps.eventStore ?? new InMemoryEventStore();
    this._clock = deps.clock ?? (() => new Date());
  }

  // ─── Paired Operations ─────────────────────────────────────────────

  /**
   * Pay the fee and receive one PAIR_UNIT plus a new collectible.
   *
   * @returns the new pair's identifier
   */
  mintPair(caller: Address, metadataPointer: string): TokenId {
    return this._guarded("mintPair", () => {
      this._access.assertNotPaused();
      this._assertAccount(caller, "caller");
      const owner = canonicalAddress(caller);

      const pointer = checkMetadataPointer(metadataPointer);
      if (!pointer.valid) {
        throw new PairingError("INVALID_METADATA_POINTER", `engine: ${pointer.reason}`);
      }

      const balance = this._stablecoin.balanceOf(owner);
      if (balance < this._fee) {
        throw new PairingError(
          "INSUFFICIENT_BALANCE",
          `engine: ${owner} holds ${balance.toString()} ${this._stablecoin.symbol}, fee is ${this._fee.toString()}`,
        );
      }
      const allowed = this._stablecoin.allowance(owner, this.address);
      if (allowed < this._fee) {
        throw new PairingError(
          "INSUFFICIENT_ALLOWANCE",
          `engine: ${owner} allows ${allowed.toString()} ${this._stablecoin.symbol} to the engine, fee is ${this._fee.toString()}`,
        );
      }

      return applyStaged(this._checkpoints(true), () => {
        this._ledger.mint(this.address, owner, PAIR_UNIT);
        const tokenId = this._registry.mint(this.address, owner, metadataPointer);
        if (this._pairs.has(tokenId)) {
          throw new PairingError(
            "INVARIANT_VIOLATION",
            `engine: registry reissued identifier ${String(tokenId)}`,
          );
        }
        const payload: PairMintedPayload = {
          owner,
          tokenId,
          amount: PAIR_UNIT.toString(),
          metadataPointer,
          fee: this._fee.toString(),
        };
        const event = this._pending(pairStreamId(tokenId), PAIR_EVENTS.PAIR_MINTED, { ...payload });

        this._pairs.set(tokenId, {
          tokenId,
          exists: true,
          mintedBy: owner,
          mintedAt: this._clock().toISOString(),
        });
        this._stablecoin.transferFrom(this.address, owner, this.address, this._fee);
        return { result: tokenId, actor: owner, event };
      });
    });
  }

  /**
   * Destroy both halves of a pair the caller owns and refund the fee.
   */
  burnPair(caller: Address, tokenId: TokenId): void {
    this._guarded("burnPair", () => {
      this._access.assertNotPaused();
      const owner = canonicalAddress(caller);
      this._assertOwnsPair(owner, tokenId);

      const escrow = this.escrowBalance();
      if (escrow < this._fee) {
        throw new PairingError(
          "INSUFFICIENT_ESCROW",
          `engine: escrow holds ${escrow.toString()} ${this._stablecoin.symbol}, refund is ${this._fee.toString()}`,
        );
      }

      const payload: PairBurnedPayload = {
        owner,
        tokenId,
        amount: PAIR_UNIT.toString(),
        refund: this._fee.toString(),
      };
      const event = this._pending(pairStreamId(tokenId), PAIR_EVENTS.PAIR_BURNED, { ...payload });

      applyStaged(this._checkpoints(true), () => {
        this._ledger.burn(this.address, owner, PAIR_UNIT);
        this._registry.burn(this.address, owner, tokenId);
        this._pairs.delete(tokenId);
        this._stablecoin.transfer(this.address, owner, this._fee);
      });
      return { result: undefined, actor: owner, event };
    });
  }

  /**
   * Move both halves of a pair from the caller to `to`. Transferring to
   * oneself moves nothing but is still recorded.
   */
  transferPair(caller: Address, to: Address, tokenId: TokenId): void {
    this._guarded("transferPair", () => {
      this._access.assertNotPaused();
      this._assertAccount(to, "recipient");
      const from = canonicalAddress(caller);
      const recipient = canonicalAddress(to);
      this._assertOwnsPair(from, tokenId);

      const payload: PairTransferredPayload = {
        from,
        to: recipient,
        tokenId,
        amount: PAIR_UNIT.toString(),
      };
      const event = this._pending(pairStreamId(tokenId), PAIR_EVENTS.PAIR_TRANSFERRED, {
        ...payload,
      });

      applyStaged(this._checkpoints(false), () => {
        this._ledger.transfer(this.address, from, recipient, PAIR_UNIT);
        this._registry.transfer(this.address, from, recipient, tokenId);
      });
      return { result: undefined, actor: from, event };
    });
  }

  // ─── Administration ────────────────────────────────────────────────

  pause(caller: Address): void {
    const event = this._pending(ENGINE_STREAM, PAIR_EVENTS.PAUSE_CHANGED, { isPaused: true });
    this._access.pause(caller);
    this._commit(canonicalAddress(caller), event);
  }

  unpause(caller: Address): void {
    const event = this._pending(ENGINE_STREAM, PAIR_EVENTS.PAUSE_CHANGED, { isPaused: false });
    this._access.unpause(caller);
    this._commit(canonicalAddress(caller), event);
  }

  /**
   * Sweep `amount` of `token` from the engine's address to the caller.
   * Admin only. Ignores pause and does not check the pairing invariant.
   */
  emergencyWithdraw(caller: Address, token: TransferableToken, amount: bigint): void {
    this._guarded("emergencyWithdraw", () => {
      this._access.assertCan(caller, "emergency-withdraw");
      const admin = canonicalAddress(caller);
      if (amount <= 0n) {
        throw new PairingError(
          "INVALID_AMOUNT",
          `engine: withdrawal amount must be positive, got ${amount.toString()}`,
        );
      }
      const held = token.balanceOf(this.address);
      if (held < amount) {
        throw new PairingError(
          "INSUFFICIENT_ESCROW",
          `engine: holds ${held.toString()} ${token.symbol}, cannot withdraw ${amount.toString()}`,
        );
      }
      const event = this._pending(ENGINE_STREAM, PAIR_EVENTS.EMERGENCY_WITHDRAWAL, {
        token: token.symbol,
        to: admin,
        amount: amount.toString(),
      });

      token.transfer(this.address, admin, amount);
      return { result: undefined, actor: admin, event };
    });
  }

  /**
   * Grant a role on the engine's controller. Admin only.
   *
   * @returns false when the account already held the role
   */
  grantRole(caller: Address, role: Role, account: Address): boolean {
    return this._access.grantRole(caller, role, account);
  }

  /**
   * Revoke a role on the engine's controller. Admin only; the last admin
   * cannot be removed.
   *
   * @returns false when the account did not hold the role
   */
  revokeRole(caller: Address, role: Role, account: Address): boolean {
    return this._access.revokeRole(caller, role, account);
  }

  // ─── Queries ───────────────────────────────────────────────────────

  get fee(): bigint {
    return this._fee;
  }

  get paused(): boolean {
    return this._access.paused;
  }

  hasRole(role: Role, account: Address): boolean {
    return this._access.hasRole(role, account);
  }

  membersOf(role: Role): readonly Address[] {
    return this._access.membersOf(role);
  }

  get livePairCount(): number {
    return this._pairs.size;
  }

  get events(): EventStore {
    return this._events;
  }

  isLive(tokenId: TokenId): boolean {
    return this._pairs.has(tokenId);
  }

  getPair(tokenId: TokenId): PairView | undefined {
    const record = this._pairs.get(tokenId);
    if (record === undefined) {
      return undefined;
    }
    return {
      ...record,
      owner: this._registry.ownerOf(tokenId),
      metadataPointer: this._registry.metadataPointerOf(tokenId),
    };
  }

  /** Live pairs in identifier order. */
  listPairs(): readonly PairView[] {
    const views: PairView[] = [];
    for (const tokenId of [...this._pairs.keys()].sort((a, b) => a - b)) {
      const view = this.getPair(tokenId);
      if (view !== undefined) {
        views.push(view);
      }
    }
    return views;
  }

  pairsOf(owner: Address): readonly PairView[] {
    const account = canonicalAddress(owner);
    return this.listPairs().filter((pair) => pair.owner === account);
  }

  escrowBalance(): bigint {
    return this._stablecoin.balanceOf(this.address);
  }

  // ─── Invariant Audit ───────────────────────────────────────────────

  /**
   * Cross-check the engine's records against the ledger, the registry
   * and the escrow. Read-only.
   */
  verifyInvariants(): InvariantReport {
    const violations: InvariantViolation[] = [];
    const owned = new Map<Address, number>();

    for (const tokenId of this._pairs.keys()) {
      if (!this._registry.exists(tokenId)) {
        violations.push({
          kind: "missing-collectible",
          tokenId,
          message: `pair ${String(tokenId)} is live but its collectible does not exist`,
        });
        continue;
      }
      const owner = this._registry.ownerOf(tokenId);
      owned.set(owner, (owned.get(owner) ?? 0) + 1);
    }

    for (const tokenId of this._registry.tokenIds()) {
      if (!this._pairs.has(tokenId)) {
        violations.push({
          kind: "orphan-collectible",
          tokenId,
          message: `collectible ${String(tokenId)} exists without a live pair`,
        });
      }
    }

    const accounts = new Set<Address>([...this._ledger.holders(), ...owned.keys()]);
    for (const account of accounts) {
      const expected = PAIR_UNIT * BigInt(owned.get(account) ?? 0);
      const actual = this._ledger.balanceOf(account);
      if (actual !== expected) {
        violations.push({
          kind: "balance-mismatch",
          account,
          message: `${account} holds ${actual.toString()}, owns pairs worth ${expected.toString()}`,
        });
      }
    }

    const livePairs = this._pairs.size;
    const expectedSupply = PAIR_UNIT * BigInt(livePairs);
    const supply = this._ledger.totalSupply();
    if (supply !== expectedSupply) {
      violations.push({
        kind: "supply-mismatch",
        message: `ledger supply is ${supply.toString()}, expected ${expectedSupply.toString()}`,
      });
    }

    const escrow = this.escrowBalance();
    const owedRefunds = this._fee * BigInt(livePairs);
    if (escrow < owedRefunds) {
      violations.push({
        kind: "escrow-shortfall",
        message: `escrow is ${escrow.toString()}, refunds owed ${owedRefunds.toString()}`,
      });
    }

    return { holds: violations.length === 0, livePairs, escrow, violations };
  }

  // ─── Snapshot ──────────────────────────────────────────────────────

  /**
   * Engine-owned state only. The ledger, registry and stablecoin
   * snapshot themselves.
   */
  snapshot(): EngineSnapshot {
    return {
      version: 1,
      address: this.address,
      fee: this._fee.toString(),
      pairs: [...this._pairs.values()].sort((a, b) => a.tokenId - b.tokenId),
      access: this._access.snapshot(),
    };
  }

  static restore(snapshot: EngineSnapshot, deps: PairingEngineDeps): PairingEngine {
    if (snapshot.version !== 1) {
      throw new PairingError(
        "INVALID_CONFIG",
        `engine: unsupported snapshot version ${String(snapshot.version)}`,
      );
    }
    const admin = snapshot.access.members.admin[0];
    if (admin === undefined) {
      throw new PairingError("INVALID_CONFIG", "engine: snapshot has no admin");
    }

    const engine = new PairingEngine(
      { address: snapshot.address, admin, fee: BigInt(snapshot.fee) },
      deps,
    );
    engine._access.restore(snapshot.access);
    for (const record of snapshot.pairs) {
      engine._pairs.set(record.tokenId, { ...record });
    }
    return engine;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  /**
   * Run `body` with the reentrancy lock held, then append its event once
   * the lock is released, so subscribers may call back into the engine.
   */
  private _guarded<T>(operation: string, body: () => Outcome<T>): T {
    if (this._locked) {
      throw new PairingError("REENTRANT_CALL", `engine: reentrant call to ${operation}`);
    }
    this._locked = true;
    let outcome: Outcome<T>;
    try {
      outcome = body();
    } finally {
      this._locked = false;
    }
    this._commit(outcome.actor, outcome.event);
    return outcome.result;
  }

  private _checkpoints(includeStablecoin: boolean): Checkpoint[] {
    const checkpoints = [
      checkpoint(this._ledger),
      checkpoint(this._registry),
      checkpointMap(this._pairs),
    ];
    if (includeStablecoin && isCheckpointable(this._stablecoin)) {
      checkpoints.push(checkpoint(this._stablecoin));
    }
    return checkpoints;
  }

  private _assertAccount(account: Address, label: string): void {
    if (!isAddress(account)) {
      throw new PairingError("INVALID_ADDRESS", `engine: invalid ${label} address "${account}"`);
    }
    if (!isNonZeroAddress(account)) {
      throw new PairingError("ZERO_ADDRESS", `engine: ${label} is the zero address`);
    }
  }

  /**
   * The pair is live, the caller owns its collectible and holds its unit.
   */
  private _assertOwnsPair(caller: Address, tokenId: TokenId): void {
    if (!this._pairs.has(tokenId)) {
      throw new PairingError("PAIR_NOT_FOUND", `engine: pair ${String(tokenId)} does not exist`);
    }
    const owner = this._registry.ownerOf(tokenId);
    if (owner !== caller) {
      throw new PairingError(
        "NOT_OWNER",
        `engine: ${caller} does not own pair ${String(tokenId)}`,
      );
    }
    const balance = this._ledger.balanceOf(caller);
    if (balance < PAIR_UNIT) {
      throw new PairingError(
        "INSUFFICIENT_BALANCE",
        `engine: ${caller} holds ${balance.toString()} pair units, needs ${PAIR_UNIT.toString()}`,
      );
    }
  }

  /**
   * Check that the event's stream will accept it. Called before the
   * operation mutates anything.
   */
  private _pending(
    streamId: string,
    type: PairEventType,
    payload: Readonly<Record<string, unknown>>,
  ): PendingEvent {
    const expectedVersion = this._events.streamVersion(streamId);
    this._events.checkAppend(streamId, type, expectedVersion);
    return { streamId, type, expectedVersion, payload };
  }

  private _commit(actor: Address, pending: PendingEvent): void {
    const event: DomainEvent = {
      type: pending.type,
      metadata: {
        eventId: randomUUID(),
        timestamp: this._clock().toISOString(),
        actor,
        correlationId: randomUUID(),
        source: "engine",
      },
      payload: pending.payload,
    };
    this._events.append(pending.streamId, event, pending.expectedVersion);
  }
}
