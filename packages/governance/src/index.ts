/**
 * @civitas/governance — Proposal, vote and timelock state machine.
 *
 * Pure reducers over the ledger record:
 * - Identifier hash for proposals and operations
 * - Membership, roles, delegation and snapshots
 * - Proposal governor and reentrancy flag
 * - Vote counting with quorum and majority rules
 * - Timelock scheduling with grace expiry and predecessors
 * - Vote-by-signature intents
 */

export { GovernanceEngine } from "./engine.js";
export type { ProposalView, OperationView, MemberView } from "./engine.js";

export {
  DEFAULT_GOVERNANCE_PARAMS,
  resolveGovernanceParams,
} from "./params.js";
export type { GovernanceParams } from "./params.js";

export {
  hashProposal,
  hashOperation,
  descriptionHashFromTime,
  digest64,
  fmix64,
} from "./hash.js";

export {
  PROPOSAL_COUNT_KEY,
  MEMBER_COUNT_KEY,
  OPERATION_COUNT_KEY,
  LOCK_KEY,
  proposalKey,
  memberKey,
  voteKey,
  operationKey,
  delegateKey,
  snapshotKey,
  voteIntentKey,
} from "./layout.js";
export type { ProposalField, OperationField } from "./layout.js";

export {
  getMemberCount,
  listMembers,
  findMember,
  getVotes,
  getRoles,
  hasRole,
  getTotalVotingPower,
  quorum,
  setMember,
  grantRole,
  revokeRole,
} from "./membership.js";
export type { MemberEntry } from "./membership.js";

export {
  delegate,
  getDelegate,
  getEffectiveVotes,
  snapshotVotingPower,
  getSnapshotVotes,
} from "./delegation.js";
export type { SnapshotOutcome } from "./delegation.js";

export {
  getProposalCount,
  readProposal,
  listProposals,
  findProposalById,
  getProposalState,
  propose,
  setProposalState,
  cancelProposal,
  isLocked,
  setLock,
} from "./governor.js";
export type { ProposeOutcome } from "./governor.js";

export {
  countVotes,
  listVotes,
  getVote,
  hasVoted,
  proposalVotes,
  quorumReached,
  voteSucceeded,
  castVote,
} from "./counting.js";

export {
  getOperationCount,
  readOperation,
  listOperations,
  getOperationState,
  findOperationByProposal,
  findOperationById,
  getPredecessor,
  schedule,
  scheduleWithPredecessor,
  executeOperation,
  checkExecutable,
  executeWithPredecessorCheck,
  cancelOperation,
} from "./timelock.js";
export type { ScheduleOutcome } from "./timelock.js";

export {
  VOTE_MESSAGE_PREFIX,
  buildVoteMessage,
  hashVoteMessage,
  validateVoteMessage,
  recordVoteIntent,
  getVoteIntent,
} from "./signatures.js";
