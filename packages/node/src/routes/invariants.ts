/**
 * GET /api/v1/invariants — Pairing invariant audit plus event chain integrity.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createInvariantRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({
      data: {
        ...service.verifyInvariants(),
        eventChain: service.verifyIntegrity(),
      },
    });
  });

  return routes;
}
