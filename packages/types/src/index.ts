/**
 * @civitas/types — Shared domain types for the governance stack.
 *
 * These types are used across all Civitas packages:
 * - Governance entities (members, proposals, votes, operations)
 * - State, support and role enumerations
 * - Error codes, exit codes and the Result type
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Governance entities and enumerations
export {
  ACCOUNT_ID_SIZE,
  ProposalState,
  VoteSupport,
  Role,
  OperationState,
} from "./governance.js";
export type {
  AccountId,
  Member,
  Proposal,
  ProposalVotes,
  VoteRecord,
  TimelockOperation,
} from "./governance.js";

// Errors and results
export { SUCCESS_CODE, EXIT_CODES, GovernanceError } from "./errors.js";
export type { GovernanceErrorCode } from "./errors.js";
export { ok, fail } from "./result.js";
export type { Result, Ok, Err, Failure } from "./result.js";

// Runtime type guards
export {
  isProposalState,
  isVoteSupport,
  isOperationState,
  isRole,
  isRoleMask,
  isAccountId,
  isZeroAccount,
  sameAccount,
  isGovernanceErrorCode,
  exitCodeOf,
} from "./guards.js";
