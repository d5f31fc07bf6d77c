/**
 * @civitas/node — Entry point.
 *
 * Loads config, builds the service and Hono app, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { accountIdFromHex } from "@civitas/record";
import { loadConfig, toGovernanceParams } from "./config.js";
import { createApp } from "./app.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const params = toGovernanceParams(config);
  const adminAccount =
    config.ADMIN_ACCOUNT === undefined ? undefined : accountIdFromHex(config.ADMIN_ACCOUNT);
  if (adminAccount === undefined) {
    logger.warn("ADMIN_ACCOUNT not set; no account can grant roles");
  }

  const { app } = createApp({
    serviceConfig: {
      params,
      adminAccount,
      logger: logger.child({ component: "dispatcher" }),
    },
    logger,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      recordCapacity: params.recordCapacity,
      votingPeriod: params.votingPeriod,
      timelockMinDelay: params.timelockMinDelay,
    },
    "Governance node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
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
