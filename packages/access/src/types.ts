/**
 * @pairmint/access — Roles, capabilities and errors.
 *
 * Privileged callers are a small fixed set, so authorization is a plain
 * lookup in PERMISSIONS rather than per-role dispatch.
 */

import type { Address, CategorizedError, ErrorCategory } from "@pairmint/types";

// ─── Roles & Capabilities ────────────────────────────────────────────────

export type Role = "admin" | "pauser" | "minter";

export type Capability =
  | "grant-role"
  | "revoke-role"
  | "pause"
  | "unpause"
  | "emergency-withdraw"
  | "set-base-metadata"
  | "mint"
  | "burn"
  | "transfer";

export const ROLES: readonly Role[] = ["admin", "pauser", "minter"] as const;

/**
 * Which capabilities each role carries.
 *
 * - admin: role administration, lifecycle, recovery, configuration
 * - pauser: lifecycle only
 * - minter: asset mutation (held by the pairing engine)
 */
export const PERMISSIONS: Readonly<Record<Role, readonly Capability[]>> = {
  admin: [
    "grant-role",
    "revoke-role",
    "pause",
    "unpause",
    "emergency-withdraw",
    "set-base-metadata",
  ],
  pauser: ["pause", "unpause"],
  minter: ["mint", "burn", "transfer"],
} as const;

// ─── Snapshot ────────────────────────────────────────────────────────────

export interface AccessSnapshot {
  readonly version: 1;
  readonly paused: boolean;
  readonly members: Readonly<Record<Role, readonly Address[]>>;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type AccessErrorCode =
  | "UNAUTHORIZED"
  | "LAST_ADMIN"
  | "INVALID_ADDRESS"
  | "PAUSED"
  | "ALREADY_PAUSED"
  | "NOT_PAUSED";

const CATEGORY: Readonly<Record<AccessErrorCode, ErrorCategory>> = {
  UNAUTHORIZED: "authorization",
  LAST_ADMIN: "authorization",
  INVALID_ADDRESS: "validation",
  PAUSED: "operational-state",
  ALREADY_PAUSED: "operational-state",
  NOT_PAUSED: "operational-state",
};

/**
 * Structured error from the access controller.
 * Always thrown — never returns error codes silently.
 */
export class AccessError extends Error implements CategorizedError {
  public readonly code: AccessErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: AccessErrorCode, message: string) {
    super(message);
    this.name = "AccessError";
    this.code = code;
    this.category = CATEGORY[code];
  }
}
