/**
 * @rxsettle/node — HTTP service for the settlement clearinghouse.
 *
 * @packageDocumentation
 */

export { ClearinghouseService } from "./services/clearinghouse-service.js";
export type {
  ClearinghouseServiceConfig,
  ScheduleRegistrationRequest,
  HealthStatus,
} from "./services/clearinghouse-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
