/**
 * Stablecoin routes (the in-memory fee token).
 *
 * POST /api/v1/stablecoin/approve — Set the caller's allowance to the engine
 * POST /api/v1/stablecoin/mint    — Mint fee tokens (stablecoin owner only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApproveSchema, StablecoinMintSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createStablecoinRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/approve", validateBody(ApproveSchema), (c) => {
    const account = c.get("service").approve(c.get("caller"), c.get("validatedBody").amount);
    return c.json({ data: account });
  });

  routes.post("/mint", validateBody(StablecoinMintSchema), (c) => {
    const body = c.get("validatedBody");
    const account = c.get("service").mintStablecoin(c.get("caller"), body.to, body.amount);
    return c.json({ data: account }, 201);
  });

  return routes;
}
