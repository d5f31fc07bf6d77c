/**
 * Runtime Type Guards
 *
 * Narrowing functions for governance values decoded from the record
 * or received at system boundaries.
 */

import {
  ACCOUNT_ID_SIZE,
  OperationState,
  ProposalState,
  Role,
  VoteSupport,
} from "./governance.js";
import type { AccountId } from "./governance.js";
import { EXIT_CODES, SUCCESS_CODE } from "./errors.js";
import type { GovernanceErrorCode } from "./errors.js";
import type { Result } from "./result.js";

// =============================================================================
// Enumerations
// =============================================================================

const PROPOSAL_STATES = new Set<number>(Object.values(ProposalState));
const VOTE_SUPPORTS = new Set<number>(Object.values(VoteSupport));
const OPERATION_STATES = new Set<number>(Object.values(OperationState));
const ROLES = new Set<number>(Object.values(Role));

export function isProposalState(value: unknown): value is ProposalState {
  return typeof value === "number" && PROPOSAL_STATES.has(value);
}

export function isVoteSupport(value: unknown): value is VoteSupport {
  return typeof value === "number" && VOTE_SUPPORTS.has(value);
}

export function isOperationState(value: unknown): value is OperationState {
  return typeof value === "number" && OPERATION_STATES.has(value);
}

/** A single role bit. Use {@link isRoleMask} for combinations. */
export function isRole(value: unknown): value is Role {
  return typeof value === "number" && ROLES.has(value);
}

export function isRoleMask(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 0xff;
}

// =============================================================================
// Accounts
// =============================================================================

export function isAccountId(value: unknown): value is AccountId {
  return value instanceof Uint8Array && value.length === ACCOUNT_ID_SIZE;
}

export function isZeroAccount(account: AccountId): boolean {
  return account.every((b) => b === 0);
}

export function sameAccount(a: AccountId, b: AccountId): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

// =============================================================================
// Error codes
// =============================================================================

export function isGovernanceErrorCode(value: unknown): value is GovernanceErrorCode {
  return typeof value === "string" && Object.hasOwn(EXIT_CODES, value);
}

/** Exit code reported to the host for a result. */
export function exitCodeOf(result: Result<unknown>): number {
  return result.ok ? SUCCESS_CODE : EXIT_CODES[result.error.code];
}
