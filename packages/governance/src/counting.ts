/**
 * @civitas/governance — Vote counter.
 *
 * Simple counting: For, Against and Abstain tallies per proposal, one
 * vote record per voter.
 *
 * Rules:
 * - A stored vote record is the only double-vote guard
 * - Tally additions are checked; overflow rejects the vote
 * - Quorum counts For + Abstain; success needs For > Against
 */

import { ProposalState, VoteSupport, fail, isVoteSupport, sameAccount } from "@civitas/types";
import type { AccountId, ProposalVotes, Result, VoteRecord } from "@civitas/types";
import {
  MAX_KEY_INDEX,
  RecordDraft,
  accountIdFromHex,
  accountIdToHex,
  checkedAddU64,
  findValue,
  formatU32,
  formatU64,
  isU64,
  parseCount,
  parseU64,
  saturatingAddU64,
} from "@civitas/record";
import { DEFAULT_GOVERNANCE_PARAMS } from "./params.js";
import type { GovernanceParams } from "./params.js";
import { proposalKey, voteKey } from "./layout.js";
import type { ProposalField } from "./layout.js";
import { getProposalState } from "./governor.js";
import { quorum } from "./membership.js";

const TALLY_FIELD: Readonly<Record<VoteSupport, ProposalField>> = {
  [VoteSupport.Against]: "against",
  [VoteSupport.For]: "for",
  [VoteSupport.Abstain]: "abstain",
};

function parseVote(value: string): VoteRecord | undefined {
  const parts = value.split(":");
  if (parts.length !== 3) return undefined;
  const [hex = "", supportText = "", weightText = ""] = parts;

  const voter = accountIdFromHex(hex);
  const support = parseCount(supportText);
  const weight = parseU64(weightText);
  if (voter === undefined || !isVoteSupport(support) || weight === undefined) {
    return undefined;
  }
  return { voter, support, weight };
}

// ─── Queries ─────────────────────────────────────────────────────────────

/** Number of consecutive vote entries stored for the proposal. */
export function countVotes(record: string, proposalIndex: number): number {
  let count = 0;
  while (count <= MAX_KEY_INDEX && findValue(record, voteKey(proposalIndex, count)) !== undefined) {
    count++;
  }
  return count;
}

export function listVotes(record: string, proposalIndex: number): VoteRecord[] {
  const votes: VoteRecord[] = [];
  const count = countVotes(record, proposalIndex);
  for (let n = 0; n < count; n++) {
    const value = findValue(record, voteKey(proposalIndex, n));
    const vote = value === undefined ? undefined : parseVote(value);
    if (vote !== undefined) votes.push(vote);
  }
  return votes;
}

export function getVote(
  record: string,
  proposalIndex: number,
  voter: AccountId,
): VoteRecord | undefined {
  return listVotes(record, proposalIndex).find((v) => sameAccount(v.voter, voter));
}

export function hasVoted(record: string, proposalIndex: number, voter: AccountId): boolean {
  return getVote(record, proposalIndex, voter) !== undefined;
}

export function proposalVotes(record: string, proposalIndex: number): ProposalVotes {
  const read = (field: ProposalField): bigint => {
    const value = findValue(record, proposalKey(proposalIndex, field));
    return value === undefined ? 0n : (parseU64(value) ?? 0n);
  };
  return {
    forVotes: read("for"),
    againstVotes: read("against"),
    abstainVotes: read("abstain"),
  };
}

export function quorumReached(
  record: string,
  proposalIndex: number,
  totalVotingPower: bigint,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): boolean {
  const { forVotes, abstainVotes } = proposalVotes(record, proposalIndex);
  return saturatingAddU64(forVotes, abstainVotes) >= quorum(totalVotingPower, params);
}

/** For strictly exceeds Against; a tie is a defeat. */
export function voteSucceeded(record: string, proposalIndex: number): boolean {
  const { forVotes, againstVotes } = proposalVotes(record, proposalIndex);
  return forVotes > againstVotes;
}

// ─── Casting ─────────────────────────────────────────────────────────────

export function castVote(
  record: string,
  proposalIndex: number,
  voter: AccountId,
  support: number,
  weight: bigint,
  now: number,
  totalVotingPower: bigint,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  if (!isVoteSupport(support)) {
    return fail("INVALID_VOTE", `Support must be 0, 1 or 2, got ${String(support)}`);
  }

  const state = getProposalState(record, proposalIndex, now, totalVotingPower, params);
  if (state !== ProposalState.Active) {
    return fail("PROPOSAL_NOT_ACTIVE", `Proposal is in state ${String(state)}, not Active`);
  }

  if (hasVoted(record, proposalIndex, voter)) {
    return fail("ALREADY_VOTED", `Account ${accountIdToHex(voter)} already voted`);
  }

  const field = TALLY_FIELD[support];
  const tallyKey = proposalKey(proposalIndex, field);
  const current = parseU64(findValue(record, tallyKey) ?? "") ?? 0n;
  const next = isU64(weight) ? checkedAddU64(current, weight) : undefined;
  if (next === undefined) {
    return fail("OVERFLOW", `Adding ${weight.toString()} to the ${field} tally overflows`);
  }

  const voteIndex = countVotes(record, proposalIndex);
  if (voteIndex > MAX_KEY_INDEX) {
    return fail("RECORD_FULL", `No vote slots left on proposal index ${String(proposalIndex)}`);
  }

  const draft = new RecordDraft(record);
  if (!draft.replace(tallyKey, formatU64(next))) {
    return fail("PROPOSAL_NOT_FOUND", `No proposal at index ${String(proposalIndex)}`);
  }
  draft.append(
    voteKey(proposalIndex, voteIndex),
    `${accountIdToHex(voter)}:${formatU32(support)}:${formatU64(weight)}`,
  );
  return draft.encode(params.recordCapacity);
}
