/**
 * @pairmint/access — Access/Lifecycle controller.
 *
 * One instance per component (engine, ledger, registry). Holds role
 * membership and the paused flag for that component only.
 *
 * Rules:
 * - Every privileged entry point calls assertCan() before mutating
 * - The last admin can never be revoked
 * - Pausing gates asset operations, never administration
 */

import type { Address } from "@pairmint/types";
import { canonicalAddress, isNonZeroAddress } from "@pairmint/types";
import type { AccessSnapshot, Capability, Role } from "./types.js";
import { AccessError, PERMISSIONS, ROLES } from "./types.js";

export class AccessController {
  private readonly _members: Map<Role, Set<Address>> = new Map();
  private _paused = false;

  /**
   * @param label - Component name used in error messages ("ledger", "engine", ...)
   * @param admin - Initial holder of the admin role
   */
  constructor(
    readonly label: string,
    admin: Address,
  ) {
    for (const role of ROLES) {
      this._members.set(role, new Set());
    }
    this._assertAddress(admin);
    this._set("admin").add(canonicalAddress(admin));
  }

  // ─── Queries ───────────────────────────────────────────────────────

  hasRole(role: Role, account: Address): boolean {
    return this._set(role).has(canonicalAddress(account));
  }

  membersOf(role: Role): readonly Address[] {
    return [...this._set(role)];
  }

  /**
   * Whether any role held by the account grants the capability.
   */
  can(account: Address, capability: Capability): boolean {
    const member = canonicalAddress(account);
    for (const role of ROLES) {
      if (this._set(role).has(member) && PERMISSIONS[role].includes(capability)) {
        return true;
      }
    }
    return false;
  }

  assertCan(account: Address, capability: Capability): void {
    if (!this.can(account, capability)) {
      throw new AccessError(
        "UNAUTHORIZED",
        `${this.label}: ${account} lacks capability "${capability}"`,
      );
    }
  }

  // ─── Role Administration ───────────────────────────────────────────

  /**
   * Grant a role. Granting a role the account already holds is a no-op.
   *
   * @returns true when membership changed
   */
  grantRole(caller: Address, role: Role, account: Address): boolean {
    this.assertCan(caller, "grant-role");
    this._assertAddress(account);

    const member = canonicalAddress(account);
    const members = this._set(role);
    if (members.has(member)) {
      return false;
    }
    members.add(member);
    return true;
  }

  /**
   * Revoke a role. Revoking a role the account does not hold is a no-op.
   *
   * @returns true when membership changed
   */
  revokeRole(caller: Address, role: Role, account: Address): boolean {
    this.assertCan(caller, "revoke-role");

    const member = canonicalAddress(account);
    const members = this._set(role);
    if (!members.has(member)) {
      return false;
    }
    if (role === "admin" && members.size === 1) {
      throw new AccessError(
        "LAST_ADMIN",
        `${this.label}: cannot revoke the last admin`,
      );
    }
    members.delete(member);
    return true;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  get paused(): boolean {
    return this._paused;
  }

  pause(caller: Address): void {
    this.assertCan(caller, "pause");
    if (this._paused) {
      throw new AccessError("ALREADY_PAUSED", `${this.label}: already paused`);
    }
    this._paused = true;
  }

  unpause(caller: Address): void {
    this.assertCan(caller, "unpause");
    if (!this._paused) {
      throw new AccessError("NOT_PAUSED", `${this.label}: not paused`);
    }
    this._paused = false;
  }

  assertNotPaused(): void {
    if (this._paused) {
      throw new AccessError("PAUSED", `${this.label}: paused`);
    }
  }

  // ─── Snapshot ──────────────────────────────────────────────────────

  snapshot(): AccessSnapshot {
    return {
      version: 1,
      paused: this._paused,
      members: {
        admin: this.membersOf("admin"),
        pauser: this.membersOf("pauser"),
        minter: this.membersOf("minter"),
      },
    };
  }

  /**
   * Replace the current state with a snapshot's.
   */
  restore(snapshot: AccessSnapshot): void {
    for (const role of ROLES) {
      this._members.set(role, new Set(snapshot.members[role].map(canonicalAddress)));
    }
    this._paused = snapshot.paused;
  }

  static fromSnapshot(label: string, snapshot: AccessSnapshot): AccessController {
    const admin = snapshot.members.admin[0];
    if (admin === undefined) {
      throw new AccessError("LAST_ADMIN", `${label}: snapshot has no admin`);
    }
    const controller = new AccessController(label, admin);
    controller.restore(snapshot);
    return controller;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _set(role: Role): Set<Address> {
    let members = this._members.get(role);
    if (members === undefined) {
      members = new Set();
      this._members.set(role, members);
    }
    return members;
  }

  private _assertAddress(account: Address): void {
    if (!isNonZeroAddress(account)) {
      throw new AccessError(
        "INVALID_ADDRESS",
        `${this.label}: invalid account address "${account}"`,
      );
    }
  }
}
