/**
 * Tests for AccessController.
 *
 * Covers:
 * - Permission table lookups
 * - Role grant/revoke and the last-admin rule
 * - Pause lifecycle
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AccessController } from "../src/access-controller.js";
import { AccessError, PERMISSIONS } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const ADMIN = `0x${"ad".repeat(20)}`;
const PAUSER = `0x${"be".repeat(20)}`;
const ENGINE = `0x${"e1".repeat(20)}`;
const STRANGER = `0x${"99".repeat(20)}`;

// ─── Tests ───────────────────────────────────────────────────────────────

describe("AccessController", () => {
  let access: AccessController;

  beforeEach(() => {
    access = new AccessController("ledger", ADMIN);
  });

  describe("permission table", () => {
    it("only admin may emergency-withdraw", () => {
      expect(PERMISSIONS.admin).toContain("emergency-withdraw");
      expect(PERMISSIONS.pauser).not.toContain("emergency-withdraw");
      expect(PERMISSIONS.minter).not.toContain("emergency-withdraw");
    });

    it("admin does not carry asset capabilities", () => {
      expect(access.can(ADMIN, "mint")).toBe(false);
      expect(access.can(ADMIN, "transfer")).toBe(false);
    });

    it("minter carries mint, burn and transfer", () => {
      access.grantRole(ADMIN, "minter", ENGINE);
      expect(access.can(ENGINE, "mint")).toBe(true);
      expect(access.can(ENGINE, "burn")).toBe(true);
      expect(access.can(ENGINE, "transfer")).toBe(true);
      expect(access.can(ENGINE, "pause")).toBe(false);
    });
  });

  describe("constructor", () => {
    it("grants admin to the initial account", () => {
      expect(access.hasRole("admin", ADMIN)).toBe(true);
      expect(access.membersOf("admin")).toEqual([ADMIN]);
    });

    it("rejects a zero admin", () => {
      expect(
        () => new AccessController("x", "0x0000000000000000000000000000000000000000"),
      ).toThrow(AccessError);
    });
  });

  describe("roles", () => {
    it("grants and revokes", () => {
      expect(access.grantRole(ADMIN, "pauser", PAUSER)).toBe(true);
      expect(access.hasRole("pauser", PAUSER)).toBe(true);
      expect(access.revokeRole(ADMIN, "pauser", PAUSER)).toBe(true);
      expect(access.hasRole("pauser", PAUSER)).toBe(false);
    });

    it("reports no-op grants and revokes", () => {
      access.grantRole(ADMIN, "pauser", PAUSER);
      expect(access.grantRole(ADMIN, "pauser", PAUSER)).toBe(false);
      expect(access.revokeRole(ADMIN, "minter", PAUSER)).toBe(false);
    });

    it("refuses grants from non-admins", () => {
      expect(() => access.grantRole(STRANGER, "minter", STRANGER)).toThrow(
        /lacks capability "grant-role"/,
      );
    });

    it("refuses to revoke the last admin", () => {
      try {
        access.revokeRole(ADMIN, "admin", ADMIN);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(AccessError);
        expect((err as AccessError).code).toBe("LAST_ADMIN");
        expect((err as AccessError).category).toBe("authorization");
      }
    });

    it("allows revoking an admin when another remains", () => {
      access.grantRole(ADMIN, "admin", PAUSER);
      expect(access.revokeRole(PAUSER, "admin", ADMIN)).toBe(true);
      expect(access.membersOf("admin")).toEqual([PAUSER]);
    });

    it("rejects malformed accounts", () => {
      expect(() => access.grantRole(ADMIN, "pauser", "not-an-address")).toThrow(
        /invalid account address/,
      );
    });
  });

  describe("pause lifecycle", () => {
    it("pauses and unpauses", () => {
      access.pause(ADMIN);
      expect(access.paused).toBe(true);
      expect(() => access.assertNotPaused()).toThrow("ledger: paused");
      access.unpause(ADMIN);
      expect(access.paused).toBe(false);
      expect(() => access.assertNotPaused()).not.toThrow();
    });

    it("lets a pauser toggle but not administer", () => {
      access.grantRole(ADMIN, "pauser", PAUSER);
      access.pause(PAUSER);
      access.unpause(PAUSER);
      expect(() => access.grantRole(PAUSER, "pauser", STRANGER)).toThrow(AccessError);
    });

    it("rejects double pause and unpause while running", () => {
      expect(() => access.unpause(ADMIN)).toThrow("ledger: not paused");
      access.pause(ADMIN);
      expect(() => access.pause(ADMIN)).toThrow("ledger: already paused");
    });

    it("refuses pause from strangers", () => {
      expect(() => access.pause(STRANGER)).toThrow(/lacks capability "pause"/);
    });
  });

  describe("snapshot", () => {
    it("restores roles and pause state", () => {
      access.grantRole(ADMIN, "minter", ENGINE);
      access.pause(ADMIN);
      const snap = access.snapshot();

      access.revokeRole(ADMIN, "minter", ENGINE);
      access.unpause(ADMIN);
      access.restore(snap);

      expect(access.hasRole("minter", ENGINE)).toBe(true);
      expect(access.paused).toBe(true);
    });

    it("rebuilds a controller from a snapshot", () => {
      access.grantRole(ADMIN, "pauser", PAUSER);
      const copy = AccessController.fromSnapshot("ledger", access.snapshot());
      expect(copy.hasRole("pauser", PAUSER)).toBe(true);
      expect(copy.hasRole("admin", ADMIN)).toBe(true);
    });

    it("rejects a snapshot without admins", () => {
      expect(() =>
        AccessController.fromSnapshot("ledger", {
          version: 1,
          paused: false,
          members: { admin: [], pauser: [], minter: [] },
        }),
      ).toThrow(AccessError);
    });
  });
});

describe("AccessController address spelling", () => {
  it("matches members whatever the letter case", () => {
    const access = new AccessController("engine", `0x${"AD".repeat(20)}`);

    expect(access.hasRole("admin", ADMIN)).toBe(true);
    expect(access.membersOf("admin")).toEqual([ADMIN]);
    access.pause(ADMIN);
    expect(access.paused).toBe(true);
  });

  it("grants once per account across spellings", () => {
    const access = new AccessController("engine", ADMIN);

    expect(access.grantRole(ADMIN, "pauser", `0x${"BE".repeat(20)}`)).toBe(true);
    expect(access.grantRole(ADMIN, "pauser", PAUSER)).toBe(false);
    expect(access.can(`0x${"Be".repeat(20)}`, "pause")).toBe(true);
    expect(access.revokeRole(ADMIN, "pauser", PAUSER)).toBe(true);
    expect(access.membersOf("pauser")).toEqual([]);
  });
});
