/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Every domain error carries a category; the category picks the HTTP
 * status, with a few codes overriding it.
 */

import type { Context } from "hono";
import type { ErrorCategory } from "@pairmint/types";
import { isCategorizedError } from "@pairmint/types";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 423 | 500;

const CATEGORY_STATUS: Readonly<Record<ErrorCategory, ErrorStatus>> = {
  validation: 400,
  authorization: 403,
  "insufficient-resource": 422,
  "invariant-violation": 409,
  "operational-state": 409,
};

const CODE_STATUS: Readonly<Record<string, ErrorStatus>> = {
  // Unknown pair or token
  PAIR_NOT_FOUND: 404,
  TOKEN_NOT_FOUND: 404,

  // Engine (or a capability) is paused
  PAUSED: 423,
};

export function statusFor(err: unknown): ErrorStatus {
  if (!isCategorizedError(err)) {
    return 500;
  }
  return CODE_STATUS[err.code] ?? CATEGORY_STATUS[err.category];
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const status = statusFor(err);

  if (status === 500 || !isCategorizedError(err)) {
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(err.code, err.message), status);
}
