/**
 * Result type for core governance operations.
 *
 * Domain failures are returned, never thrown. A failed result means
 * the input record was not changed.
 */

import type { GovernanceErrorCode } from "./errors.js";

export interface Failure {
  readonly code: GovernanceErrorCode;
  readonly message: string;
}

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err {
  readonly ok: false;
  readonly error: Failure;
}

export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function fail(code: GovernanceErrorCode, message: string): Err {
  return { ok: false, error: { code, message } };
}
