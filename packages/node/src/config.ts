/**
 * @pairmint/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { LoggerOptions } from "pino";
import { isNonZeroAddress } from "@pairmint/types";

// =============================================================================
// Schema
// =============================================================================

const AddressVar = z
  .string()
  .refine(isNonZeroAddress, { message: "must be a non-zero 0x-prefixed 40-hex-digit address" });

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Deployment
  ENGINE_ADDRESS: AddressVar.default("0x00000000000000000000000000000000000000e1"),
  ADMIN_ADDRESS: AddressVar.default("0x00000000000000000000000000000000000000ad"),

  // Fee / refund, as a decimal string at 6 decimals
  PAIR_FEE: z
    .string()
    .regex(/^\d+(\.\d{1,6})?$/, { message: "must be a decimal amount with at most 6 places" })
    .default("1.000000"),

  STABLECOIN_SYMBOL: z.string().min(1).max(16).default("USDC"),
  BASE_METADATA_POINTER: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * pino options for a config. Pretty printing only in development.
 */
export function loggerOptions(config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">): LoggerOptions {
  if (config.NODE_ENV === "development") {
    return { level: config.LOG_LEVEL, transport: { target: "pino-pretty" } };
  }
  return { level: config.LOG_LEVEL };
}
