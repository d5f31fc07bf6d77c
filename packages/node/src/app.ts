/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { GovernanceService } from "./services/governance-service.js";
import type { GovernanceServiceConfig } from "./services/governance-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { callerMiddleware } from "./middleware/caller.js";
import { createHealthRoutes } from "./routes/health.js";
import { createRecordRoutes } from "./routes/record.js";
import { createMemberRoutes } from "./routes/members.js";
import { createDelegationRoutes } from "./routes/delegations.js";
import { createOperationRoutes, createProposalRoutes } from "./routes/proposals.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Existing service to serve. Built from serviceConfig when absent. */
  readonly service?: GovernanceService | undefined;
  readonly serviceConfig?: GovernanceServiceConfig | undefined;
  /** Request logger. Requests are not logged when absent. */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: GovernanceService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = options.service ?? new GovernanceService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", callerMiddleware());

  app.route("/api/v1/record", createRecordRoutes());
  app.route("/api/v1/members", createMemberRoutes());
  app.route("/api/v1/delegations", createDelegationRoutes());
  app.route("/api/v1/proposals", createProposalRoutes());
  app.route("/api/v1/operations", createOperationRoutes());

  return { app, service };
}
