/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@pairmint/types";
import type { PairService } from "../services/pair-service.js";

/**
 * Hono environment type for the pairmint app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The deployment every /api route operates on */
    service: PairService;

    /** Transaction sender from X-Caller-Address (set by caller middleware on mutations) */
    caller: Address;
  };
}
