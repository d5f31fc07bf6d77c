/**
 * @civitas/node — HTTP host for the governance engine.
 *
 * Package public API: the host contract, the dispatcher, the service
 * and the Hono app factory. The server itself starts from main.ts.
 */

export { InMemoryHost } from "./host.js";
export type { GovernanceHost, InMemoryHostOptions } from "./host.js";
export { GovernanceDispatcher } from "./dispatcher.js";
export type {
  GovernanceAction,
  ActionKind,
  DispatchReceipt,
  DispatcherOptions,
  ExecutionContext,
  ExecutionHook,
} from "./dispatcher.js";
export { GovernanceService } from "./services/governance-service.js";
export type {
  GovernanceServiceConfig,
  RecordSnapshot,
  SnapshotReceipt,
} from "./services/governance-service.js";
export { loadConfig, toGovernanceParams, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
