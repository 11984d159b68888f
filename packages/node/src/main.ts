/**
 * @pairmint/node — Entry point.
 *
 * Loads config, builds the app, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, loggerOptions } from "./config.js";
import { createApp } from "./app.js";

function main(): void {
  const config = loadConfig();
  const logger = pino(loggerOptions(config));

  const { app, service } = createApp({
    serviceConfig: {
      engineAddress: config.ENGINE_ADDRESS,
      admin: config.ADMIN_ADDRESS,
      fee: config.PAIR_FEE,
      stablecoinSymbol: config.STABLECOIN_SYMBOL,
      baseMetadataPointer: config.BASE_METADATA_POINTER,
      logger: logger.child({ component: "pair-service" }),
    },
    logFn: (entry) => {
      const level = entry.status >= 500 ? "error" : entry.status >= 400 ? "warn" : "info";
      logger[level](entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, ...service.info() },
    "pairmint node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
