/**
 * Pair routes.
 *
 * POST /api/v1/pairs               — Mint a pair (fee pulled from caller)
 * GET  /api/v1/pairs               — List live pairs (?owner= filters)
 * GET  /api/v1/pairs/:id           — Get a live pair
 * POST /api/v1/pairs/:id/transfer  — Move both halves to another holder
 * POST /api/v1/pairs/:id/burn      — Destroy both halves, refund the fee
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListPairsQuerySchema, MintPairSchema, TransferPairSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseTokenId } from "./params.js";

export function createPairRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/pairs — Mint
  routes.post("/", validateBody(MintPairSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const pair = service.mintPair(c.get("caller"), body.metadataPointer);
    return c.json({ data: pair }, 201);
  });

  // GET /api/v1/pairs — List
  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListPairsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    return c.json({ data: service.listPairs(queryResult.data.owner) });
  });

  // GET /api/v1/pairs/:id
  routes.get("/:id", (c) => {
    const service = c.get("service");
    const tokenId = parseTokenId(c.req.param("id"));
    if (tokenId === undefined) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Pair ID must be a non-negative integer"), 400);
    }

    const pair = service.getPair(tokenId);
    if (pair === undefined) {
      return c.json(
        createErrorEnvelope("PAIR_NOT_FOUND", `Pair ${String(tokenId)} does not exist`),
        404,
      );
    }
    return c.json({ data: pair });
  });

  // POST /api/v1/pairs/:id/transfer
  routes.post("/:id/transfer", validateBody(TransferPairSchema), (c) => {
    const service = c.get("service");
    const tokenId = parseTokenId(c.req.param("id"));
    if (tokenId === undefined) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Pair ID must be a non-negative integer"), 400);
    }

    const pair = service.transferPair(c.get("caller"), c.get("validatedBody").to, tokenId);
    return c.json({ data: pair });
  });

  // POST /api/v1/pairs/:id/burn
  routes.post("/:id/burn", (c) => {
    const service = c.get("service");
    const tokenId = parseTokenId(c.req.param("id"));
    if (tokenId === undefined) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Pair ID must be a non-negative integer"), 400);
    }

    const caller = c.get("caller");
    service.burnPair(caller, tokenId);
    return c.json({ data: { tokenId, burned: true, account: service.account(caller) } });
  });

  return routes;
}
