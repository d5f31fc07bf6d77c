/**
 * @civitas/governance — Governance engine.
 *
 * Composes the governor, counter, membership ledger and timelock into
 * caller-level actions. Every action is a pure function of the current
 * record and its inputs; a failed result means nothing changed.
 *
 * Rules:
 * - Proposing and voting use the caller's effective (delegated) votes
 * - Only Succeeded proposals are queued; queueing stores Queued
 * - Execution needs the Executor role and runs under the record lock
 * - Power and role changes need the Admin role
 */

import { ProposalState, Role, fail, ok } from "@civitas/types";
import type {
  AccountId,
  Err,
  OperationState,
  Proposal,
  Result,
  TimelockOperation,
  VoteRecord,
} from "@civitas/types";
import { accountIdToHex } from "@civitas/record";
import { resolveGovernanceParams } from "./params.js";
import type { GovernanceParams } from "./params.js";
import { descriptionHashFromTime } from "./hash.js";
import {
  findMember,
  getTotalVotingPower,
  grantRole,
  hasRole,
  listMembers,
  quorum,
  revokeRole,
  setMember,
} from "./membership.js";
import type { MemberEntry } from "./membership.js";
import {
  delegate,
  getDelegate,
  getEffectiveVotes,
  snapshotVotingPower,
} from "./delegation.js";
import type { SnapshotOutcome } from "./delegation.js";
import {
  cancelProposal,
  findProposalById,
  getProposalState,
  isLocked,
  listProposals,
  propose,
  readProposal,
  setLock,
  setProposalState,
} from "./governor.js";
import type { ProposeOutcome } from "./governor.js";
import { castVote, listVotes, quorumReached } from "./counting.js";
import {
  checkExecutable,
  executeWithPredecessorCheck,
  findOperationById,
  findOperationByProposal,
  getOperationState,
  readOperation,
  schedule,
} from "./timelock.js";
import type { ScheduleOutcome } from "./timelock.js";
import { recordVoteIntent } from "./signatures.js";

// ─── Views ───────────────────────────────────────────────────────────────

export interface OperationView {
  readonly operation: TimelockOperation;
  readonly state: OperationState;
}

export interface ProposalView {
  readonly proposal: Proposal;
  readonly state: ProposalState;
  readonly quorumRequired: bigint;
  readonly quorumReached: boolean;
  readonly votes: readonly VoteRecord[];
  readonly operation?: OperationView | undefined;
}

export interface MemberView extends MemberEntry {
  readonly delegate: AccountId;
  readonly effectiveVotes: bigint;
}

// ─── Engine ──────────────────────────────────────────────────────────────

export class GovernanceEngine {
  private readonly _params: GovernanceParams;

  constructor(overrides: Partial<GovernanceParams> = {}) {
    this._params = resolveGovernanceParams(overrides);
  }

  get params(): GovernanceParams {
    return this._params;
  }

  // ─── Membership ──────────────────────────────────────────────────

  /** Register the caller with the self-registration power and no roles. */
  selfRegister(record: string, caller: AccountId): Result<string> {
    if (findMember(record, caller) !== undefined) {
      return ok(record);
    }
    return setMember(record, caller, this._params.selfRegisterPower, 0, this._params);
  }

  /** Admin: set an account's base power, registering it when needed. */
  setVotingPower(
    record: string,
    caller: AccountId,
    account: AccountId,
    votingPower: bigint,
  ): Result<string> {
    const denied = this._requireRole(record, caller, Role.Admin);
    if (denied !== undefined) return denied;

    const roles = findMember(record, account)?.roles ?? 0;
    return setMember(record, account, votingPower, roles, this._params);
  }

  grantRole(record: string, caller: AccountId, account: AccountId, role: number): Result<string> {
    const denied = this._requireRole(record, caller, Role.Admin);
    if (denied !== undefined) return denied;
    return grantRole(record, account, role, this._params);
  }

  revokeRole(record: string, caller: AccountId, account: AccountId, role: number): Result<string> {
    const denied = this._requireRole(record, caller, Role.Admin);
    if (denied !== undefined) return denied;
    return revokeRole(record, account, role, this._params);
  }

  delegate(record: string, caller: AccountId, target: AccountId): Result<string> {
    return delegate(record, caller, target, this._params);
  }

  snapshot(record: string, proposalId: number, account: AccountId): Result<SnapshotOutcome> {
    const found = findProposalById(record, proposalId);
    if (!found.ok) return found;
    return snapshotVotingPower(record, proposalId, account, this._params);
  }

  // ─── Proposals ───────────────────────────────────────────────────

  propose(
    record: string,
    caller: AccountId,
    now: number,
    descriptionHash: number = descriptionHashFromTime(now),
  ): Result<ProposeOutcome> {
    const votes = getEffectiveVotes(record, caller);
    return propose(record, caller, descriptionHash, now, votes, this._params);
  }

  castVote(
    record: string,
    caller: AccountId,
    proposalId: number,
    support: number,
    now: number,
  ): Result<string> {
    const found = findProposalById(record, proposalId);
    if (!found.ok) return found;

    return castVote(
      record,
      found.value,
      caller,
      support,
      getEffectiveVotes(record, caller),
      now,
      getTotalVotingPower(record),
      this._params,
    );
  }

  submitVoteIntent(
    record: string,
    caller: AccountId,
    proposalId: number,
    support: number,
  ): Result<string> {
    const found = findProposalById(record, proposalId);
    if (!found.ok) return found;
    return recordVoteIntent(record, proposalId, support, caller, this._params);
  }

  cancel(record: string, caller: AccountId, proposalId: number, now: number): Result<string> {
    const found = findProposalById(record, proposalId);
    if (!found.ok) return found;
    return cancelProposal(
      record,
      found.value,
      caller,
      now,
      getTotalVotingPower(record),
      this._params,
    );
  }

  /** Schedule a Succeeded proposal with the minimum delay and mark it Queued. */
  queue(record: string, proposalId: number, now: number): Result<ScheduleOutcome> {
    const found = findProposalById(record, proposalId);
    if (!found.ok) return found;

    const state = getProposalState(record, found.value, now, getTotalVotingPower(record), this._params);
    if (state !== ProposalState.Succeeded) {
      return fail("PROPOSAL_NOT_ACTIVE", `Proposal ${String(proposalId)} has not succeeded`);
    }

    const scheduled = schedule(record, proposalId, now, this._params.timelockMinDelay, this._params);
    if (!scheduled.ok) return scheduled;

    const queued = setProposalState(scheduled.value.record, found.value, ProposalState.Queued, this._params);
    if (!queued.ok) return queued;
    return ok({ ...scheduled.value, record: queued.value });
  }

  // ─── Execution ───────────────────────────────────────────────────

  /**
   * Check the caller may execute and take the lock.
   * Returns the locked record.
   */
  beginExecution(record: string, caller: AccountId): Result<string> {
    const denied = this._requireRole(record, caller, Role.Executor);
    if (denied !== undefined) return denied;

    if (isLocked(record)) {
      return fail("REENTRANT", "Execution already in progress");
    }
    return setLock(record, true, this._params);
  }

  /**
   * Check, without writing, that the operation queued for `proposalId`
   * can run now. Returns its operation index.
   */
  validateExecution(record: string, proposalId: number, now: number): Result<number> {
    const opIndex = findOperationByProposal(record, proposalId);
    if (!opIndex.ok) return opIndex;
    return checkExecutable(record, opIndex.value, now, this._params);
  }

  /**
   * Execute the operation queued for `proposalId` on a locked record,
   * mark the proposal Executed and release the lock.
   */
  completeExecution(lockedRecord: string, proposalId: number, now: number): Result<string> {
    const opIndex = findOperationByProposal(lockedRecord, proposalId);
    if (!opIndex.ok) return opIndex;

    const executed = executeWithPredecessorCheck(lockedRecord, opIndex.value, now, this._params);
    if (!executed.ok) return executed;

    let record = executed.value;
    const proposalIndex = findProposalById(record, proposalId);
    if (proposalIndex.ok) {
      const marked = setProposalState(record, proposalIndex.value, ProposalState.Executed, this._params);
      if (!marked.ok) return marked;
      record = marked.value;
    }

    return this.releaseLock(record);
  }

  releaseLock(record: string): Result<string> {
    return setLock(record, false, this._params);
  }

  /**
   * Whole execution in one step. On any failure the input record is
   * the current state, so the lock is never left held.
   */
  execute(record: string, caller: AccountId, proposalId: number, now: number): Result<string> {
    const locked = this.beginExecution(record, caller);
    if (!locked.ok) return locked;
    return this.completeExecution(locked.value, proposalId, now);
  }

  // ─── Views ───────────────────────────────────────────────────────

  describeProposal(record: string, proposalId: number, now: number): Result<ProposalView> {
    const found = findProposalById(record, proposalId);
    if (!found.ok) return found;

    const proposal = readProposal(record, found.value);
    if (proposal === undefined) {
      return fail("PROPOSAL_NOT_FOUND", `Proposal ${String(proposalId)} is incomplete`);
    }
    return ok(this._viewOf(record, proposal, now));
  }

  describeOperation(record: string, operationId: number, now: number): Result<OperationView> {
    const found = findOperationById(record, operationId);
    if (!found.ok) return found;

    const operation = readOperation(record, found.value);
    if (operation === undefined) {
      return fail("PROPOSAL_NOT_FOUND", `Operation ${String(operationId)} is incomplete`);
    }
    return ok({ operation, state: getOperationState(record, found.value, now, this._params) });
  }

  listProposals(record: string, now: number): ProposalView[] {
    return listProposals(record).map((p) => this._viewOf(record, p, now));
  }

  listMembers(record: string): MemberView[] {
    return listMembers(record).map((m) => ({
      ...m,
      delegate: getDelegate(record, m.account),
      effectiveVotes: getEffectiveVotes(record, m.account),
    }));
  }

  // ─── Internal ────────────────────────────────────────────────────

  private _viewOf(record: string, proposal: Proposal, now: number): ProposalView {
    const total = getTotalVotingPower(record);
    const opIndex = findOperationByProposal(record, proposal.id);
    const operation = opIndex.ok ? readOperation(record, opIndex.value) : undefined;

    return {
      proposal,
      state: getProposalState(record, proposal.index, now, total, this._params),
      quorumRequired: quorum(total, this._params),
      quorumReached: quorumReached(record, proposal.index, total, this._params),
      votes: listVotes(record, proposal.index),
      operation:
        operation === undefined
          ? undefined
          : { operation, state: getOperationState(record, operation.index, now, this._params) },
    };
  }

  private _requireRole(record: string, caller: AccountId, role: Role): Err | undefined {
    if (hasRole(record, caller, role)) return undefined;
    const code = role === Role.Admin ? "NOT_ADMIN" : role === Role.Executor ? "NOT_EXECUTOR" : "NOT_PROPOSER";
    return fail(code, `Account ${accountIdToHex(caller)} lacks role ${String(role)}`);
  }
}
