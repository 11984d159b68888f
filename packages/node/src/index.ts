/**
 * @pairmint/node — HTTP surface over one pairing deployment.
 */

export { PairService } from "./services/pair-service.js";
export type {
  PairServiceConfig,
  PairDto,
  AccountDto,
  InvariantReportDto,
  DeploymentInfo,
} from "./services/pair-service.js";
export { loadConfig, loggerOptions, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
