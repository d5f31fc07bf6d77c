/**
 * Caller identity middleware.
 *
 * Reads the X-Account-Id header (40 hex characters) into the `caller`
 * context variable. Mutating routes pass it to {@link requireCaller}.
 */

import type { MiddlewareHandler } from "hono";
import { accountIdFromHex } from "@civitas/record";
import type { AccountId } from "@civitas/types";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

export const ACCOUNT_ID_HEADER = "X-Account-Id";

export function callerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(ACCOUNT_ID_HEADER);
    if (header !== undefined && accountIdFromHex(header) === undefined) {
      throw new ApiError(
        "VALIDATION_ERROR",
        400,
        `${ACCOUNT_ID_HEADER} must be 40 hex characters`,
      );
    }
    c.set("caller", header === undefined ? undefined : accountIdFromHex(header));
    await next();
  };
}

/** The request's caller; 401 when no X-Account-Id header was sent. */
export function requireCaller(caller: AccountId | undefined): AccountId {
  if (caller === undefined) {
    throw new ApiError("UNAUTHORIZED", 401, `${ACCOUNT_ID_HEADER} header is required`);
  }
  return caller;
}
