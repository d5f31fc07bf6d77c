/**
 * @civitas/governance — Proposal governor.
 *
 * Proposal creation, state resolution and cancellation, plus the
 * reentrancy flag that guards execution.
 *
 * Rules:
 * - Proposal ids are non-zero and derived from proposer, description,
 *   time and the current proposal count
 * - Canceled, Queued, Executed and Expired are stored; every other state
 *   is derived from timestamps and tallies at read time
 * - Only the proposer may cancel, and only while the proposal is Pending
 */

import {
  ProposalState,
  fail,
  isProposalState,
  ok,
  sameAccount,
} from "@civitas/types";
import type { AccountId, Proposal, Result } from "@civitas/types";
import {
  RecordDraft,
  accountIdFromHex,
  accountIdToHex,
  checkedAddU32,
  findValue,
  formatU32,
  formatU64,
  parseCount,
  parseU32,
  parseU64,
  saturatingAddU64,
} from "@civitas/record";
import { DEFAULT_GOVERNANCE_PARAMS } from "./params.js";
import type { GovernanceParams } from "./params.js";
import { hashProposal } from "./hash.js";
import { LOCK_KEY, PROPOSAL_COUNT_KEY, proposalKey, readCount } from "./layout.js";
import { quorum } from "./membership.js";

export interface ProposeOutcome {
  readonly record: string;
  readonly proposalId: number;
  readonly index: number;
}

/** States that are stored explicitly and win over derived ones. */
const EXPLICIT_STATES: ReadonlySet<ProposalState> = new Set<ProposalState>([
  ProposalState.Canceled,
  ProposalState.Queued,
  ProposalState.Executed,
  ProposalState.Expired,
]);

// ─── Field Access ────────────────────────────────────────────────────────

function readU32(record: string, index: number, field: "id" | "start" | "end" | "desc"): number {
  const value = findValue(record, proposalKey(index, field));
  return value === undefined ? 0 : (parseU32(value) ?? 0);
}

function readU64(record: string, index: number, field: "for" | "against" | "abstain"): bigint {
  const value = findValue(record, proposalKey(index, field));
  return value === undefined ? 0n : (parseU64(value) ?? 0n);
}

function readStoredState(record: string, index: number): ProposalState {
  const value = findValue(record, proposalKey(index, "state"));
  const parsed = value === undefined ? undefined : parseCount(value);
  return isProposalState(parsed) ? parsed : ProposalState.Pending;
}

// ─── Queries ─────────────────────────────────────────────────────────────

export function getProposalCount(record: string): number {
  return readCount(record, PROPOSAL_COUNT_KEY);
}

/** Decoded proposal at `index`, or undefined when it has no id or proposer. */
export function readProposal(record: string, index: number): Proposal | undefined {
  const idText = findValue(record, proposalKey(index, "id"));
  const proposerHex = findValue(record, proposalKey(index, "proposer"));
  if (idText === undefined || proposerHex === undefined) return undefined;

  const id = parseU32(idText);
  const proposer = accountIdFromHex(proposerHex);
  if (id === undefined || proposer === undefined) return undefined;

  return {
    index,
    id,
    proposer,
    voteStart: readU32(record, index, "start"),
    voteEnd: readU32(record, index, "end"),
    storedState: readStoredState(record, index),
    forVotes: readU64(record, index, "for"),
    againstVotes: readU64(record, index, "against"),
    abstainVotes: readU64(record, index, "abstain"),
    descriptionHash: readU32(record, index, "desc"),
  };
}

export function listProposals(record: string): Proposal[] {
  const proposals: Proposal[] = [];
  const count = getProposalCount(record);
  for (let index = 0; index < count; index++) {
    const proposal = readProposal(record, index);
    if (proposal !== undefined) proposals.push(proposal);
  }
  return proposals;
}

/** Index of the proposal whose stored id equals `proposalId`. */
export function findProposalById(record: string, proposalId: number): Result<number> {
  const target = formatU32(proposalId);
  const count = getProposalCount(record);
  for (let index = 0; index < count; index++) {
    if (findValue(record, proposalKey(index, "id")) === target) {
      return ok(index);
    }
  }
  return fail("PROPOSAL_NOT_FOUND", `No proposal with id ${target}`);
}

/**
 * Current state of the proposal at `index`.
 *
 * Explicit states are returned as stored. Otherwise: Pending before
 * voteStart, Active through voteEnd, then Defeated unless For + Abstain
 * reach quorum and For strictly exceeds Against.
 */
export function getProposalState(
  record: string,
  index: number,
  now: number,
  totalVotingPower: bigint,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): ProposalState {
  const stored = readStoredState(record, index);
  if (EXPLICIT_STATES.has(stored)) return stored;

  if (now < readU32(record, index, "start")) return ProposalState.Pending;
  if (now <= readU32(record, index, "end")) return ProposalState.Active;

  const forVotes = readU64(record, index, "for");
  const againstVotes = readU64(record, index, "against");
  const abstainVotes = readU64(record, index, "abstain");

  if (saturatingAddU64(forVotes, abstainVotes) < quorum(totalVotingPower, params)) {
    return ProposalState.Defeated;
  }
  return forVotes > againstVotes ? ProposalState.Succeeded : ProposalState.Defeated;
}

// ─── Mutations ───────────────────────────────────────────────────────────

/**
 * Create a proposal.
 *
 * proposal_count moves to the end of the record, followed by the new
 * proposal's fields in a fixed order.
 */
export function propose(
  record: string,
  proposer: AccountId,
  descriptionHash: number,
  now: number,
  proposerVotes: bigint,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<ProposeOutcome> {
  if (proposerVotes < params.proposalThreshold) {
    return fail(
      "BELOW_THRESHOLD",
      `Proposer has ${proposerVotes.toString()} votes, threshold is ${params.proposalThreshold.toString()}`,
    );
  }

  const index = getProposalCount(record);
  if (index >= params.maxProposals) {
    return fail("MAX_PROPOSALS", `Proposal limit reached (${String(params.maxProposals)})`);
  }

  const voteStart = checkedAddU32(now, params.votingDelay);
  const voteEnd = voteStart === undefined ? undefined : checkedAddU32(voteStart, params.votingPeriod);
  if (voteStart === undefined || voteEnd === undefined) {
    return fail("OVERFLOW", `Voting window starting at ${String(now)} exceeds u32 time`);
  }

  const proposalId = hashProposal(proposer, descriptionHash, now, index);

  const draft = new RecordDraft(record)
    .remove(PROPOSAL_COUNT_KEY)
    .append(PROPOSAL_COUNT_KEY, formatU32(index + 1))
    .append(proposalKey(index, "id"), formatU32(proposalId))
    .append(proposalKey(index, "proposer"), accountIdToHex(proposer))
    .append(proposalKey(index, "state"), formatU32(ProposalState.Pending))
    .append(proposalKey(index, "start"), formatU32(voteStart))
    .append(proposalKey(index, "end"), formatU32(voteEnd))
    .append(proposalKey(index, "for"), formatU64(0n))
    .append(proposalKey(index, "against"), formatU64(0n))
    .append(proposalKey(index, "abstain"), formatU64(0n))
    .append(proposalKey(index, "desc"), formatU32(descriptionHash));

  const encoded = draft.encode(params.recordCapacity);
  if (!encoded.ok) return encoded;
  return ok({ record: encoded.value, proposalId, index });
}

/** Overwrite the stored state. Fails when the proposal has no state entry. */
export function setProposalState(
  record: string,
  index: number,
  state: ProposalState,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  const draft = new RecordDraft(record);
  if (!draft.replace(proposalKey(index, "state"), formatU32(state))) {
    return fail("PROPOSAL_NOT_FOUND", `No proposal at index ${String(index)}`);
  }
  return draft.encode(params.recordCapacity);
}

export function cancelProposal(
  record: string,
  index: number,
  caller: AccountId,
  now: number,
  totalVotingPower: bigint,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  const proposerHex = findValue(record, proposalKey(index, "proposer"));
  if (proposerHex === undefined) {
    return fail("PROPOSAL_NOT_FOUND", `No proposal at index ${String(index)}`);
  }

  const proposer = accountIdFromHex(proposerHex);
  if (proposer === undefined || !sameAccount(proposer, caller)) {
    return fail("NOT_PROPOSER", "Only the proposer can cancel");
  }

  const state = getProposalState(record, index, now, totalVotingPower, params);
  if (state !== ProposalState.Pending) {
    return fail("PROPOSAL_NOT_ACTIVE", `Proposal is in state ${String(state)}, not Pending`);
  }

  return setProposalState(record, index, ProposalState.Canceled, params);
}

// ─── Reentrancy Flag ─────────────────────────────────────────────────────

export function isLocked(record: string): boolean {
  return findValue(record, LOCK_KEY) === "1";
}

export function setLock(
  record: string,
  locked: boolean,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  return new RecordDraft(record).set(LOCK_KEY, locked ? "1" : "0").encode(params.recordCapacity);
}
