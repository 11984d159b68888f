/**
 * @pairmint/registry — Collectible registry (the pair's non-fungible half).
 *
 * API surface:
 * - mint() / burn() / transfer() — minter capability only (the pairing engine)
 * - setBaseMetadataPointer() — admin only
 * - ownerOf() / exists() / metadataPointerOf() / tokensOf() — queries
 * - snapshot() / restore() — checkpointing
 *
 * The identifier counter only moves forward. A burned identifier is gone
 * for good.
 */

import type { Address, TokenId } from "@pairmint/types";
import { canonicalAddress, isAddress, isNonZeroAddress } from "@pairmint/types";
import { AccessController } from "@pairmint/access";
import { validateMetadataPointer } from "./metadata-pointer.js";
import type { CollectibleRecord, PairRegistry, RegistrySnapshot } from "./types.js";
import { RegistryError } from "./types.js";

export interface CollectibleRegistryConfig {
  readonly name: string;
  readonly admin: Address;
  readonly baseMetadataPointer?: string | undefined;
}

export class CollectibleRegistry implements PairRegistry {
  readonly name: string;
  readonly access: AccessController;
  private readonly _tokens: Map<TokenId, CollectibleRecord> = new Map();
  private _nextTokenId: TokenId = 0;
  private _baseMetadataPointer = "";

  constructor(config: CollectibleRegistryConfig) {
    this.name = config.name;
    this.access = new AccessController(`registry(${config.name})`, config.admin);
    const base = config.baseMetadataPointer ?? "";
    if (base !== "") {
      validateMetadataPointer(base);
      this._baseMetadataPointer = base;
    }
  }

  // ─── Queries ───────────────────────────────────────────────────────

  get nextTokenId(): TokenId {
    return this._nextTokenId;
  }

  get totalSupply(): number {
    return this._tokens.size;
  }

  get baseMetadataPointer(): string {
    return this._baseMetadataPointer;
  }

  exists(tokenId: TokenId): boolean {
    return this._tokens.has(tokenId);
  }

  ownerOf(tokenId: TokenId): Address {
    return this._get(tokenId).owner;
  }

  /**
   * Resolved pointer: base + stored pointer when a base is set.
   */
  metadataPointerOf(tokenId: TokenId): string {
    return this._baseMetadataPointer + this._get(tokenId).metadataPointer;
  }

  balanceOf(owner: Address): number {
    return this.tokensOf(owner).length;
  }

  tokensOf(owner: Address): readonly TokenId[] {
    const holder = canonicalAddress(owner);
    const owned: TokenId[] = [];
    for (const record of this._tokens.values()) {
      if (record.owner === holder) {
        owned.push(record.tokenId);
      }
    }
    return owned;
  }

  tokenIds(): readonly TokenId[] {
    return [...this._tokens.keys()];
  }

  // ─── Privileged Mutations ──────────────────────────────────────────

  /**
   * Mint the next identifier to `to`.
   *
   * @returns the new identifier
   */
  mint(caller: Address, to: Address, metadataPointer: string): TokenId {
    this.access.assertNotPaused();
    this.access.assertCan(caller, "mint");
    this._assertRecipient(to);
    validateMetadataPointer(metadataPointer);

    const tokenId = this._nextTokenId;
    this._tokens.set(tokenId, { tokenId, owner: canonicalAddress(to), metadataPointer });
    this._nextTokenId = tokenId + 1;
    return tokenId;
  }

  /**
   * Burn a token on behalf of its holder. The privileged caller acts for
   * `holder`, who must be the current owner.
   */
  burn(caller: Address, holder: Address, tokenId: TokenId): void {
    this.access.assertNotPaused();
    this.access.assertCan(caller, "burn");
    this._assertOwner(tokenId, holder);

    this._tokens.delete(tokenId);
  }

  transfer(caller: Address, from: Address, to: Address, tokenId: TokenId): void {
    this.access.assertNotPaused();
    this.access.assertCan(caller, "transfer");
    this._assertRecipient(to);
    const record = this._assertOwner(tokenId, from);

    this._tokens.set(tokenId, { ...record, owner: canonicalAddress(to) });
  }

  /**
   * Set the base prepended to every stored pointer. Empty string clears it.
   */
  setBaseMetadataPointer(caller: Address, base: string): void {
    this.access.assertCan(caller, "set-base-metadata");
    if (base !== "") {
      validateMetadataPointer(base);
    }
    this._baseMetadataPointer = base;
  }

  // ─── Snapshot ──────────────────────────────────────────────────────

  snapshot(): RegistrySnapshot {
    return {
      version: 1,
      nextTokenId: this._nextTokenId,
      baseMetadataPointer: this._baseMetadataPointer,
      tokens: [...this._tokens.values()],
      access: this.access.snapshot(),
    };
  }

  restore(snapshot: RegistrySnapshot): void {
    this._tokens.clear();
    for (const record of snapshot.tokens) {
      this._tokens.set(record.tokenId, { ...record, owner: canonicalAddress(record.owner) });
    }
    this._nextTokenId = snapshot.nextTokenId;
    this._baseMetadataPointer = snapshot.baseMetadataPointer;
    this.access.restore(snapshot.access);
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _get(tokenId: TokenId): CollectibleRecord {
    const record = this._tokens.get(tokenId);
    if (record === undefined) {
      throw new RegistryError(
        "TOKEN_NOT_FOUND",
        `${this.name}: token ${String(tokenId)} does not exist`,
      );
    }
    return record;
  }

  private _assertOwner(tokenId: TokenId, account: Address): CollectibleRecord {
    const record = this._get(tokenId);
    if (record.owner !== canonicalAddress(account)) {
      throw new RegistryError(
        "NOT_OWNER",
        `${this.name}: ${account} does not own token ${String(tokenId)}`,
      );
    }
    return record;
  }

  private _assertRecipient(to: Address): void {
    if (!isAddress(to)) {
      throw new RegistryError("INVALID_ADDRESS", `${this.name}: invalid address "${to}"`);
    }
    if (!isNonZeroAddress(to)) {
      throw new RegistryError("ZERO_ADDRESS", `${this.name}: zero address not allowed`);
    }
  }
}
