/**
 * JSON response views.
 *
 * Voting power and tallies are u64 and leave the service as decimal
 * strings; accounts leave as 40 lowercase hex characters.
 */

import { OperationState, ProposalState, Role, VoteSupport } from "@civitas/types";
import type { VoteRecord } from "@civitas/types";
import { accountIdToHex } from "@civitas/record";
import type { MemberView, OperationView, ProposalView } from "@civitas/governance";

// =============================================================================
// Names
// =============================================================================

const PROPOSAL_STATE_NAMES: Readonly<Record<ProposalState, string>> = {
  [ProposalState.Pending]: "Pending",
  [ProposalState.Active]: "Active",
  [ProposalState.Canceled]: "Canceled",
  [ProposalState.Defeated]: "Defeated",
  [ProposalState.Succeeded]: "Succeeded",
  [ProposalState.Queued]: "Queued",
  [ProposalState.Expired]: "Expired",
  [ProposalState.Executed]: "Executed",
};

const OPERATION_STATE_NAMES: Readonly<Record<OperationState, string>> = {
  [OperationState.Unset]: "Unset",
  [OperationState.Pending]: "Pending",
  [OperationState.Ready]: "Ready",
  [OperationState.Done]: "Done",
  [OperationState.Expired]: "Expired",
};

const SUPPORT_NAMES: Readonly<Record<VoteSupport, string>> = {
  [VoteSupport.Against]: "against",
  [VoteSupport.For]: "for",
  [VoteSupport.Abstain]: "abstain",
};

export function roleNames(roles: number): string[] {
  const names: string[] = [];
  if ((roles & Role.Proposer) !== 0) names.push("proposer");
  if ((roles & Role.Executor) !== 0) names.push("executor");
  if ((roles & Role.Admin) !== 0) names.push("admin");
  return names;
}

// =============================================================================
// Views
// =============================================================================

export interface MemberJson {
  readonly index: number;
  readonly account: string;
  readonly votingPower: string;
  readonly roles: readonly string[];
  readonly delegate: string;
  readonly effectiveVotes: string;
}

export interface VoteJson {
  readonly voter: string;
  readonly support: string;
  readonly weight: string;
}

export interface OperationJson {
  readonly id: number;
  readonly proposalId: number;
  readonly readyAt: number;
  readonly state: string;
  readonly predecessorId: number;
}

export interface ProposalJson {
  readonly id: number;
  readonly index: number;
  readonly proposer: string;
  readonly state: string;
  readonly voteStart: number;
  readonly voteEnd: number;
  readonly descriptionHash: number;
  readonly forVotes: string;
  readonly againstVotes: string;
  readonly abstainVotes: string;
  readonly quorumRequired: string;
  readonly quorumReached: boolean;
  readonly votes: readonly VoteJson[];
  readonly operation: OperationJson | null;
}

export function memberToJson(view: MemberView): MemberJson {
  return {
    index: view.index,
    account: accountIdToHex(view.account),
    votingPower: view.votingPower.toString(),
    roles: roleNames(view.roles),
    delegate: accountIdToHex(view.delegate),
    effectiveVotes: view.effectiveVotes.toString(),
  };
}

function voteToJson(vote: VoteRecord): VoteJson {
  return {
    voter: accountIdToHex(vote.voter),
    support: SUPPORT_NAMES[vote.support],
    weight: vote.weight.toString(),
  };
}

export function operationToJson(view: OperationView): OperationJson {
  return {
    id: view.operation.id,
    proposalId: view.operation.proposalId,
    readyAt: view.operation.readyAt,
    state: OPERATION_STATE_NAMES[view.state],
    predecessorId: view.operation.predecessorId,
  };
}

export function proposalToJson(view: ProposalView): ProposalJson {
  const { proposal } = view;
  return {
    id: proposal.id,
    index: proposal.index,
    proposer: accountIdToHex(proposal.proposer),
    state: PROPOSAL_STATE_NAMES[view.state],
    voteStart: proposal.voteStart,
    voteEnd: proposal.voteEnd,
    descriptionHash: proposal.descriptionHash,
    forVotes: proposal.forVotes.toString(),
    againstVotes: proposal.againstVotes.toString(),
    abstainVotes: proposal.abstainVotes.toString(),
    quorumRequired: view.quorumRequired.toString(),
    quorumReached: view.quorumReached,
    votes: view.votes.map(voteToJson),
    operation: view.operation === undefined ? null : operationToJson(view.operation),
  };
}
