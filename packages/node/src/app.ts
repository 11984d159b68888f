/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests call
 * createApp() directly; main.ts adds the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { PairService } from "./services/pair-service.js";
import type { PairServiceConfig } from "./services/pair-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { callerMiddleware } from "./middleware/caller.js";
import { createErrorEnvelope } from "./types/error.js";
import {
  createAccountRoutes,
  createAdminRoutes,
  createEventRoutes,
  createHealthRoutes,
  createInvariantRoutes,
  createPairRoutes,
  createStablecoinRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: PairServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: PairService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new PairService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", callerMiddleware());

  app.route("/api/v1/pairs", createPairRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/stablecoin", createStablecoinRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/invariants", createInvariantRoutes());

  return { app, service };
}
