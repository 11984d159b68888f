/**
 * PairService — composition root for one pairing deployment.
 *
 * Wires the fungible ledger, collectible registry, stablecoin, event
 * store and engine together, grants the engine the minter role on both
 * capabilities, and converts between decimal strings at the HTTP edge
 * and base units inside.
 *
 * Every committed operation is logged at info, every rejected one at
 * warn with its error code, and every appended event at debug. A failing
 * event subscriber is logged at error and leaves the operation committed.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Address, TokenId } from "@pairmint/types";
import { PAIR_UNIT, TOKEN_DECIMALS, canonicalAddress, isCategorizedError } from "@pairmint/types";
import type { Role } from "@pairmint/access";
import { FungibleLedger, InMemoryStablecoin, formatAmount, parseAmount } from "@pairmint/ledger";
import { CollectibleRegistry } from "@pairmint/registry";
import { InMemoryEventStore } from "@pairmint/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@pairmint/event-store";
import { PairingEngine } from "@pairmint/engine";
import type { InvariantViolation, PairView } from "@pairmint/engine";

// =============================================================================
// Config & Views
// =============================================================================

export interface PairServiceConfig {
  readonly engineAddress: Address;
  readonly admin: Address;
  /** Fee / refund as a decimal string ("1.000000") */
  readonly fee: string;
  readonly stablecoinSymbol: string;
  readonly baseMetadataPointer?: string | undefined;
  readonly logger?: Logger | undefined;
}

/** A live pair with its fungible amount formatted for display. */
export interface PairDto extends PairView {
  readonly amount: string;
}

export interface AccountDto {
  readonly address: Address;
  readonly pairBalance: string;
  readonly stablecoinBalance: string;
  readonly engineAllowance: string;
  readonly tokenIds: readonly TokenId[];
}

export interface InvariantReportDto {
  readonly holds: boolean;
  readonly livePairs: number;
  readonly escrow: string;
  readonly requiredEscrow: string;
  readonly violations: readonly InvariantViolation[];
}

export interface DeploymentInfo {
  readonly engine: Address;
  readonly admin: Address;
  readonly fee: string;
  readonly stablecoin: string;
  readonly paused: boolean;
  readonly livePairs: number;
}

// =============================================================================
// Service
// =============================================================================

export class PairService {
  readonly engine: PairingEngine;
  readonly ledger: FungibleLedger;
  readonly registry: CollectibleRegistry;
  readonly stablecoin: InMemoryStablecoin;
  readonly eventStore: InMemoryEventStore;
  private readonly admin: Address;
  private readonly logger: Logger;

  constructor(config: PairServiceConfig) {
    this.admin = canonicalAddress(config.admin);
    this.logger = config.logger ?? pino({ level: "silent" });
    this.ledger = new FungibleLedger({ symbol: "PAIR", admin: config.admin });
    this.registry = new CollectibleRegistry({
      name: "pairs",
      admin: config.admin,
      baseMetadataPointer: config.baseMetadataPointer,
    });
    this.stablecoin = new InMemoryStablecoin({
      symbol: config.stablecoinSymbol,
      owner: config.admin,
    });
    this.eventStore = new InMemoryEventStore({
      onHandlerFailure: (failure) => {
        this.logger.error(
          { streamId: failure.streamId, globalPosition: failure.globalPosition, err: failure.error },
          "event subscriber failed",
        );
      },
    });
    this.eventStore.subscribeAll((stored) => {
      this.logger.debug(
        { streamId: stored.streamId, version: stored.version, type: stored.event.type },
        "event appended",
      );
    });
    this.engine = new PairingEngine(
      {
        address: config.engineAddress,
        admin: config.admin,
        fee: parseAmount(config.fee, TOKEN_DECIMALS),
      },
      {
        ledger: this.ledger,
        registry: this.registry,
        stablecoin: this.stablecoin,
        eventStore: this.eventStore,
      },
    );

    this.ledger.access.grantRole(config.admin, "minter", config.engineAddress);
    this.registry.access.grantRole(config.admin, "minter", config.engineAddress);
  }

  // ─── Pairs ─────────────────────────────────────────────────────────

  mintPair(caller: Address, metadataPointer: string): PairDto {
    return this.run("mintPair", { caller }, () => {
      const tokenId = this.engine.mintPair(caller, metadataPointer);
      return this.requirePair(tokenId);
    });
  }

  burnPair(caller: Address, tokenId: TokenId): void {
    this.run("burnPair", { caller, tokenId }, () => {
      this.engine.burnPair(caller, tokenId);
    });
  }

  transferPair(caller: Address, to: Address, tokenId: TokenId): PairDto {
    return this.run("transferPair", { caller, to, tokenId }, () => {
      this.engine.transferPair(caller, to, tokenId);
      return this.requirePair(tokenId);
    });
  }

  getPair(tokenId: TokenId): PairDto | undefined {
    const pair = this.engine.getPair(tokenId);
    return pair === undefined ? undefined : this.toDto(pair);
  }

  listPairs(owner?: Address): readonly PairDto[] {
    const pairs = owner === undefined ? this.engine.listPairs() : this.engine.pairsOf(owner);
    return pairs.map((pair) => this.toDto(pair));
  }

  // ─── Accounts & Stablecoin ─────────────────────────────────────────

  account(address: Address): AccountDto {
    return {
      address: canonicalAddress(address),
      pairBalance: formatAmount(this.ledger.balanceOf(address), TOKEN_DECIMALS),
      stablecoinBalance: formatAmount(this.stablecoin.balanceOf(address), this.stablecoin.decimals),
      engineAllowance: formatAmount(
        this.stablecoin.allowance(address, this.engine.address),
        this.stablecoin.decimals,
      ),
      tokenIds: this.pairsOwnedBy(address),
    };
  }

  /** Set the caller's stablecoin allowance to the engine. */
  approve(caller: Address, amount: string): AccountDto {
    return this.run("approve", { caller, amount }, () => {
      this.stablecoin.approve(caller, this.engine.address, parseAmount(amount, this.stablecoin.decimals));
      return this.account(caller);
    });
  }

  mintStablecoin(caller: Address, to: Address, amount: string): AccountDto {
    return this.run("mintStablecoin", { caller, to, amount }, () => {
      this.stablecoin.mint(caller, to, parseAmount(amount, this.stablecoin.decimals));
      return this.account(to);
    });
  }

  // ─── Administration ────────────────────────────────────────────────

  pause(caller: Address): DeploymentInfo {
    return this.run("pause", { caller }, () => {
      this.engine.pause(caller);
      return this.info();
    });
  }

  unpause(caller: Address): DeploymentInfo {
    return this.run("unpause", { caller }, () => {
      this.engine.unpause(caller);
      return this.info();
    });
  }

  emergencyWithdraw(caller: Address, amount: string): AccountDto {
    return this.run("emergencyWithdraw", { caller, amount }, () => {
      this.engine.emergencyWithdraw(
        caller,
        this.stablecoin,
        parseAmount(amount, this.stablecoin.decimals),
      );
      return this.account(caller);
    });
  }

  grantRole(caller: Address, role: Role, account: Address): boolean {
    return this.run("grantRole", { caller, role, account }, () =>
      this.engine.grantRole(caller, role, account),
    );
  }

  revokeRole(caller: Address, role: Role, account: Address): boolean {
    return this.run("revokeRole", { caller, role, account }, () =>
      this.engine.revokeRole(caller, role, account),
    );
  }

  // ─── Events & Audit ────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  verifyInvariants(): InvariantReportDto {
    const report = this.engine.verifyInvariants();
    return {
      holds: report.holds,
      livePairs: report.livePairs,
      escrow: formatAmount(report.escrow, this.stablecoin.decimals),
      requiredEscrow: formatAmount(
        this.engine.fee * BigInt(report.livePairs),
        this.stablecoin.decimals,
      ),
      violations: report.violations,
    };
  }

  info(): DeploymentInfo {
    return {
      engine: this.engine.address,
      admin: this.admin,
      fee: formatAmount(this.engine.fee, this.stablecoin.decimals),
      stablecoin: this.stablecoin.symbol,
      paused: this.engine.paused,
      livePairs: this.engine.livePairCount,
    };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private run<T>(op: string, fields: Record<string, unknown>, fn: () => T): T {
    try {
      const result = fn();
      this.logger.info({ op, ...fields }, `${op} committed`);
      return result;
    } catch (err) {
      if (isCategorizedError(err)) {
        this.logger.warn({ op, ...fields, code: err.code }, `${op} rejected: ${err.message}`);
      } else {
        this.logger.error({ op, ...fields, err }, `${op} failed`);
      }
      throw err;
    }
  }

  private pairsOwnedBy(owner: Address): readonly TokenId[] {
    return this.engine.pairsOf(owner).map((pair) => pair.tokenId);
  }

  private requirePair(tokenId: TokenId): PairDto {
    const pair = this.getPair(tokenId);
    if (pair === undefined) {
      throw new Error(`pair ${String(tokenId)} missing after commit`);
    }
    return pair;
  }

  private toDto(pair: PairView): PairDto {
    return { ...pair, amount: formatAmount(PAIR_UNIT, TOKEN_DECIMALS) };
  }
}
