/**
 * Raw record route.
 *
 * GET /api/v1/record — Record text, its byte length and the capacity
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createRecordRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").getRecord() });
  });

  return routes;
}
