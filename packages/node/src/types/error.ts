/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 *
 * Governance failures carry their exit code in `details.exitCode`.
 */

import type { GovernanceErrorCode } from "@civitas/types";

// =============================================================================
// Error Codes
// =============================================================================

/** Error codes raised by the HTTP layer itself. */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | GovernanceErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

/** Thrown by route handlers for request problems outside the governance core. */
export class ApiError extends Error {
  readonly code: ApiErrorCode;
  readonly status: ErrorStatus;

  constructor(code: ApiErrorCode, status: ErrorStatus, message: string) {
    super(message);
    this.name = "ApiError";
    this.code = code;
    this.status = status;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | GovernanceErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
