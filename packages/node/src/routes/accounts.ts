/**
 * Account routes.
 *
 * GET /api/v1/accounts/:address — Pair balance, stablecoin balance,
 *                                 allowance to the engine, owned pairs
 */

import { Hono } from "hono";
import { isAddress } from "@pairmint/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address", (c) => {
    const address = c.req.param("address");
    if (!isAddress(address)) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", `Invalid address "${address}"`), 400);
    }
    return c.json({ data: c.get("service").account(address) });
  });

  return routes;
}
