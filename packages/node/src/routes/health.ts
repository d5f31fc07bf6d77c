/**
 * Health check routes.
 *
 * GET /health — Liveness probe with record usage
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const { bytes, capacity } = c.get("service").getRecord();
    return c.json({
      status: "ok",
      record: { bytes, capacity },
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
