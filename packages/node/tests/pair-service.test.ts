/**
 * PairService tests — wiring and operation logging.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import { PairService } from "../src/services/pair-service.js";
import { ADMIN, ALICE, BOB, ENGINE } from "./setup.js";

function capturingLogger(
  level: "info" | "debug" = "info",
): { logger: Logger; lines: () => Array<Record<string, unknown>> } {
  const raw: string[] = [];
  const logger = pino({ level }, { write: (msg: string) => raw.push(msg) });
  return {
    logger,
    lines: () => raw.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

function service(logger?: Logger): PairService {
  return new PairService({
    engineAddress: ENGINE,
    admin: ADMIN,
    fee: "1",
    stablecoinSymbol: "USDC",
    logger,
  });
}

describe("PairService", () => {
  it("grants the engine the minter role on both halves", () => {
    const svc = service();

    expect(svc.ledger.access.hasRole("minter", ENGINE)).toBe(true);
    expect(svc.registry.access.hasRole("minter", ENGINE)).toBe(true);
  });

  it("runs the full mint, transfer, burn cycle", () => {
    const svc = service();
    svc.mintStablecoin(ADMIN, ALICE, "1");
    svc.approve(ALICE, "1");

    const pair = svc.mintPair(ALICE, "ipfs://QmPairOne");
    expect(pair).toMatchObject({ tokenId: 0, owner: ALICE, amount: "1.000000" });

    expect(svc.transferPair(ALICE, BOB, 0).owner).toBe(BOB);
    svc.burnPair(BOB, 0);

    expect(svc.account(BOB)).toEqual({
      address: BOB,
      pairBalance: "0.000000",
      stablecoinBalance: "1.000000",
      engineAllowance: "0.000000",
      tokenIds: [],
    });
    expect(svc.verifyInvariants()).toEqual({
      holds: true,
      livePairs: 0,
      escrow: "0.000000",
      requiredEscrow: "0.000000",
      violations: [],
    });
    expect(svc.verifyIntegrity().valid).toBe(true);
  });

  it("prefixes relative pointers with the base pointer", () => {
    const svc = new PairService({
      engineAddress: ENGINE,
      admin: ADMIN,
      fee: "1",
      stablecoinSymbol: "USDC",
      baseMetadataPointer: "https://meta.example.com/",
    });
    svc.mintStablecoin(ADMIN, ALICE, "1");
    svc.approve(ALICE, "1");

    expect(svc.mintPair(ALICE, "ipfs://QmPairOne").metadataPointer).toBe(
      "https://meta.example.com/ipfs://QmPairOne",
    );
  });

  it("logs committed operations at info", () => {
    const { logger, lines } = capturingLogger();
    const svc = service(logger);
    svc.mintStablecoin(ADMIN, ALICE, "1");

    expect(lines()).toHaveLength(1);
    expect(lines()[0]).toMatchObject({
      level: 30,
      op: "mintStablecoin",
      caller: ADMIN,
      to: ALICE,
      amount: "1",
      msg: "mintStablecoin committed",
    });
  });

  it("logs rejected operations at warn with the error code", () => {
    const { logger, lines } = capturingLogger();
    const svc = service(logger);

    expect(() => svc.mintPair(ALICE, "ipfs://QmPairOne")).toThrow();
    expect(lines()).toHaveLength(1);
    expect(lines()[0]).toMatchObject({
      level: 40,
      op: "mintPair",
      caller: ALICE,
      code: "INSUFFICIENT_BALANCE",
    });
  });

  it("logs each appended event at debug", () => {
    const { logger, lines } = capturingLogger("debug");
    const svc = service(logger);
    svc.mintStablecoin(ADMIN, ALICE, "1");
    svc.approve(ALICE, "1");

    svc.mintPair(ALICE, "ipfs://QmPairOne");

    expect(lines().filter((line) => line.msg === "event appended")).toEqual([
      expect.objectContaining({ level: 20, streamId: "pair-0", version: 1, type: "pair.minted" }),
    ]);
  });

  it("logs a failing event subscriber at error and keeps the operation", () => {
    const { logger, lines } = capturingLogger();
    const svc = service(logger);
    svc.mintStablecoin(ADMIN, ALICE, "1");
    svc.approve(ALICE, "1");
    svc.eventStore.subscribeAll(() => {
      throw new Error("projection offline");
    });

    expect(svc.mintPair(ALICE, "ipfs://QmPairOne").owner).toBe(ALICE);

    expect(lines().find((line) => line.level === 50)).toMatchObject({
      msg: "event subscriber failed",
      streamId: "pair-0",
      globalPosition: 1,
    });
    expect(lines().at(-1)).toMatchObject({ level: 30, msg: "mintPair committed" });
    expect(svc.verifyInvariants().holds).toBe(true);
  });

  it("administers engine roles and records the resulting pause", () => {
    const svc = service();

    expect(svc.grantRole(ADMIN, "pauser", BOB)).toBe(true);
    expect(svc.pause(BOB).paused).toBe(true);

    const [paused] = svc.readStreamEvents("engine");
    expect(paused?.event.metadata.actor).toBe(BOB);
    expect(svc.revokeRole(ADMIN, "pauser", BOB)).toBe(true);
  });

  it("reports accounts under their canonical spelling", () => {
    const svc = service();
    svc.mintStablecoin(ADMIN, `0x${"A".repeat(40)}`, "1");

    expect(svc.account(`0x${"A".repeat(40)}`)).toMatchObject({
      address: ALICE,
      stablecoinBalance: "1.000000",
    });
  });
});
