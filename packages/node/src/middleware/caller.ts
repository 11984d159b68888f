/**
 * Caller middleware.
 *
 * The X-Caller-Address header names the transaction sender. Mutating
 * requests (anything but GET/HEAD) must carry a well-formed address, which
 * is stored in its canonical lowercase spelling; the engine decides
 * whether that address may do what it asks.
 */

import type { MiddlewareHandler } from "hono";
import { canonicalAddress, isAddress } from "@pairmint/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Address";

const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export function callerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (READ_METHODS.has(c.req.method)) {
      return next();
    }

    const caller = c.req.header(CALLER_HEADER);
    if (caller === undefined || caller === "") {
      return c.json(
        createErrorEnvelope("MISSING_CALLER", `${CALLER_HEADER} header is required`),
        400,
      );
    }
    if (!isAddress(caller)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `${CALLER_HEADER} is not a valid address`),
        400,
      );
    }

    c.set("caller", canonicalAddress(caller));
    return next();
  };
}
