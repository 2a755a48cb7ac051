/**
 * @keel/node — Package public API.
 *
 * main.ts starts the server; everything a host needs to embed the
 * app is exported from here.
 */

export { KeelService } from "./services/keel-service.js";
export type {
  KeelServiceConfig,
  KeelServiceDeps,
  FeeKindName,
  BookName,
  VaultState,
  PoolState,
} from "./services/keel-service.js";
export { RoleAuthorizer } from "./services/role-authorizer.js";
export { BookCallExecutor } from "./services/book-call-executor.js";
export type { DispatchedCall } from "./services/book-call-executor.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
