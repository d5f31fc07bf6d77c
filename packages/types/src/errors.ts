/**
 * Governance error codes and their signed exit codes.
 *
 * Exit codes are what a dispatched action reports to its host:
 * {@link SUCCESS_CODE} on success, a negative code per error kind otherwise.
 */

export type GovernanceErrorCode =
  | "WRONG_ACCOUNT"
  | "TOO_EARLY"
  | "NOT_APPROVED"
  | "DATA_READ"
  | "HOST_CALL"
  | "BAD_CONFIG"
  | "ALREADY_VOTED"
  | "PROPOSAL_NOT_ACTIVE"
  | "BELOW_THRESHOLD"
  | "MAX_PROPOSALS"
  | "NOT_PROPOSER"
  | "NOT_EXECUTOR"
  | "OP_NOT_READY"
  | "OP_ALREADY_QUEUED"
  | "PROPOSAL_NOT_FOUND"
  | "INVALID_VOTE"
  | "QUORUM_NOT_MET"
  | "NOT_ADMIN"
  | "OVERFLOW"
  | "REENTRANT"
  | "OP_EXPIRED"
  | "CALLER_VERIFICATION"
  | "RECORD_FULL"
  | "NOT_MEMBER";

export const SUCCESS_CODE = 1;

export const EXIT_CODES: Readonly<Record<GovernanceErrorCode, number>> = {
  WRONG_ACCOUNT: -1,
  TOO_EARLY: -2,
  NOT_APPROVED: -3,
  DATA_READ: -4,
  HOST_CALL: -5,
  BAD_CONFIG: -6,
  ALREADY_VOTED: -7,
  PROPOSAL_NOT_ACTIVE: -8,
  BELOW_THRESHOLD: -9,
  MAX_PROPOSALS: -10,
  NOT_PROPOSER: -11,
  NOT_EXECUTOR: -12,
  OP_NOT_READY: -13,
  OP_ALREADY_QUEUED: -14,
  PROPOSAL_NOT_FOUND: -15,
  INVALID_VOTE: -16,
  QUORUM_NOT_MET: -17,
  NOT_ADMIN: -18,
  OVERFLOW: -19,
  REENTRANT: -20,
  OP_EXPIRED: -21,
  CALLER_VERIFICATION: -22,
  RECORD_FULL: -23,
  NOT_MEMBER: -24,
};

/**
 * Thrown at boundaries that cannot return a Result: parameter validation
 * and the HTTP layer.
 */
export class GovernanceError extends Error {
  readonly code: GovernanceErrorCode;
  readonly exitCode: number;

  constructor(code: GovernanceErrorCode, message: string) {
    super(message);
    this.name = "GovernanceError";
    this.code = code;
    this.exitCode = EXIT_CODES[code];
  }
}
