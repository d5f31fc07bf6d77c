/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps governance error codes to HTTP status codes and carries the
 * exit code in the envelope details.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { GovernanceError } from "@civitas/types";
import type { GovernanceErrorCode } from "@civitas/types";
import { ApiError, createErrorEnvelope } from "../types/error.js";
import type { ErrorStatus } from "../types/error.js";

// =============================================================================
// Governance Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Readonly<Record<GovernanceErrorCode, ErrorStatus>> = {
  // Not found
  PROPOSAL_NOT_FOUND: 404,
  NOT_MEMBER: 404,

  // Authorization
  WRONG_ACCOUNT: 403,
  NOT_APPROVED: 403,
  NOT_PROPOSER: 403,
  NOT_EXECUTOR: 403,
  NOT_ADMIN: 403,
  BELOW_THRESHOLD: 403,
  CALLER_VERIFICATION: 403,

  // State conflicts
  TOO_EARLY: 409,
  ALREADY_VOTED: 409,
  PROPOSAL_NOT_ACTIVE: 409,
  OP_NOT_READY: 409,
  OP_ALREADY_QUEUED: 409,
  OP_EXPIRED: 409,
  QUORUM_NOT_MET: 409,
  REENTRANT: 409,

  // Input validation
  INVALID_VOTE: 400,

  // Capacity and overflow
  BAD_CONFIG: 422,
  MAX_PROPOSALS: 422,
  OVERFLOW: 422,
  RECORD_FULL: 422,

  // Host failures
  DATA_READ: 500,
  HOST_CALL: 500,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof GovernanceError) {
    const status = STATUS_MAP[err.code];
    // Don't leak host internals
    const message = status === 500 ? "Internal server error" : err.message;
    return c.json(
      createErrorEnvelope(err.code, message, { exitCode: err.exitCode }),
      status,
    );
  }

  if (err instanceof ApiError) {
    return c.json(createErrorEnvelope(err.code, err.message), err.status);
  }

  if (err instanceof HTTPException && err.status === 400) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), 400);
  }

  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
