/**
 * Governance entity types.
 *
 * These describe the logical entities encoded in the ledger record.
 * The record itself is plain text; these are the decoded views.
 *
 * Rules:
 * - All types are readonly
 * - Timestamps, ids and indices are 32-bit unsigned numbers
 * - Voting power and tallies are 64-bit unsigned bigints
 */

// =============================================================================
// Accounts
// =============================================================================

/** Size in bytes of an account identifier. */
export const ACCOUNT_ID_SIZE = 20;

/** A 20-byte account identifier. */
export type AccountId = Uint8Array;

// =============================================================================
// Enumerations
// =============================================================================

export const ProposalState = {
  Pending: 0,
  Active: 1,
  Canceled: 2,
  Defeated: 3,
  Succeeded: 4,
  Queued: 5,
  Expired: 6,
  Executed: 7,
} as const;

export type ProposalState = (typeof ProposalState)[keyof typeof ProposalState];

export const VoteSupport = {
  Against: 0,
  For: 1,
  Abstain: 2,
} as const;

export type VoteSupport = (typeof VoteSupport)[keyof typeof VoteSupport];

/** Role bits. Combine with `|`, remove with `& ~role`. */
export const Role = {
  Proposer: 1,
  Executor: 2,
  Admin: 4,
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export const OperationState = {
  Unset: 0,
  Pending: 1,
  Ready: 2,
  Done: 3,
  Expired: 4,
} as const;

export type OperationState = (typeof OperationState)[keyof typeof OperationState];

// =============================================================================
// Entities
// =============================================================================

export interface Member {
  readonly account: AccountId;
  readonly votingPower: bigint;
  /** Role bitmask (see {@link Role}). */
  readonly roles: number;
}

export interface Proposal {
  readonly index: number;
  /** Non-zero 32-bit identifier. */
  readonly id: number;
  readonly proposer: AccountId;
  readonly voteStart: number;
  readonly voteEnd: number;
  /** Stored state; authoritative only for explicit transitions. */
  readonly storedState: ProposalState;
  readonly forVotes: bigint;
  readonly againstVotes: bigint;
  readonly abstainVotes: bigint;
  readonly descriptionHash: number;
}

export interface ProposalVotes {
  readonly forVotes: bigint;
  readonly againstVotes: bigint;
  readonly abstainVotes: bigint;
}

export interface VoteRecord {
  readonly voter: AccountId;
  readonly support: VoteSupport;
  readonly weight: bigint;
}

export interface TimelockOperation {
  readonly index: number;
  /** Non-zero 32-bit identifier. */
  readonly id: number;
  readonly proposalId: number;
  readonly readyAt: number;
  readonly storedState: OperationState;
  /** Operation that must be Done first; 0 when there is none. */
  readonly predecessorId: number;
}
