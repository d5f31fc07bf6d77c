/**
 * Structured request logging middleware.
 *
 * One pino line per request with method, path, status, duration,
 * request id and caller. Client errors log at warn, server errors at
 * error.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import { accountIdToHex } from "@civitas/record";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly caller?: string | undefined;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const caller = c.get("caller");
    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      caller: caller === undefined ? undefined : accountIdToHex(caller),
    };

    const message = `${entry.method} ${entry.path} ${String(entry.status)}`;
    if (entry.status >= 500) {
      logger.error(entry, message);
    } else if (entry.status >= 400) {
      logger.warn(entry, message);
    } else {
      logger.info(entry, message);
    }
  };
}
