/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (event chain intact and invariants hold)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { PairService } from "../services/pair-service.js";

export function createHealthRoutes(service: PairService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyIntegrity();
    const invariants = service.verifyInvariants();
    const ready = integrity.valid && invariants.holds;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        eventChain: integrity.valid ? "ok" : "broken",
        invariants: invariants.holds ? "ok" : "violated",
        paused: service.info().paused,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
