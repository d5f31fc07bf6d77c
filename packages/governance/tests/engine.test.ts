import { describe, it, expect } from "vitest";
import { GovernanceError, OperationState, ProposalState, Role, VoteSupport } from "@civitas/types";
import { GovernanceEngine } from "../src/engine.js";
import { findMember } from "../src/membership.js";
import { isLocked } from "../src/governor.js";
import { ALICE, BOB, CAROL, errorCode, hexOf, unwrap, withMembers } from "./helpers.js";

const PROPOSAL_ID = 625063841;
const OPERATION_ID = 3077563739;
const VOTE_END = 260_500;
const READY_AT = 260_501 + 172_800;

const engine = new GovernanceEngine();
const members = withMembers([
  { account: ALICE, power: 200_000_000n, roles: Role.Proposer | Role.Executor | Role.Admin },
  { account: BOB, power: 100_000_000n },
]);

function voted(): string {
  let record = unwrap(engine.propose(members, ALICE, 1000, 42)).record;
  record = unwrap(engine.castVote(record, ALICE, PROPOSAL_ID, VoteSupport.For, 2000));
  return unwrap(engine.castVote(record, BOB, PROPOSAL_ID, VoteSupport.Against, 2000));
}

function queued(): string {
  return unwrap(engine.queue(voted(), PROPOSAL_ID, VOTE_END + 1)).record;
}

describe("GovernanceEngine", () => {
  describe("construction", () => {
    it("applies parameter overrides", () => {
      expect(new GovernanceEngine({ votingDelay: 10 }).params.votingDelay).toBe(10);
      expect(engine.params.votingDelay).toBe(300);
    });

    it("rejects invalid parameters", () => {
      expect(() => new GovernanceEngine({ quorumPercentage: 101n })).toThrow(GovernanceError);
    });
  });

  describe("membership", () => {
    it("self-registers new accounts with no roles", () => {
      const record = unwrap(engine.selfRegister(members, CAROL));
      expect(findMember(record, CAROL)).toMatchObject({ index: 2, votingPower: 0n, roles: 0 });
      expect(unwrap(engine.selfRegister(record, CAROL))).toBe(record);
    });

    it("requires Admin to set power and keeps roles", () => {
      expect(errorCode(engine.setVotingPower(members, BOB, BOB, 1n))).toBe("NOT_ADMIN");
      const record = unwrap(engine.setVotingPower(members, ALICE, ALICE, 5n));
      expect(findMember(record, ALICE)).toMatchObject({ votingPower: 5n, roles: 7 });
      const added = unwrap(engine.setVotingPower(members, ALICE, CAROL, 9n));
      expect(findMember(added, CAROL)).toMatchObject({ votingPower: 9n, roles: 0 });
    });

    it("requires Admin to change roles", () => {
      expect(errorCode(engine.grantRole(members, BOB, BOB, Role.Admin))).toBe("NOT_ADMIN");
      expect(errorCode(engine.revokeRole(members, BOB, ALICE, Role.Admin))).toBe("NOT_ADMIN");
      const granted = unwrap(engine.grantRole(members, ALICE, BOB, Role.Executor));
      expect(findMember(granted, BOB)?.roles).toBe(Role.Executor);
      const revoked = unwrap(engine.revokeRole(granted, ALICE, BOB, Role.Executor));
      expect(findMember(revoked, BOB)?.roles).toBe(0);
    });

    it("lists members with delegation details", () => {
      const record = unwrap(engine.delegate(members, BOB, ALICE));
      const views = engine.listMembers(record);
      expect(views.map((v) => v.effectiveVotes)).toEqual([300_000_000n, 0n]);
      expect(views[1]?.delegate).toEqual(ALICE);
    });
  });

  describe("proposals", () => {
    it("derives the description hash from time when none is given", () => {
      expect(unwrap(engine.propose(members, ALICE, 1000)).proposalId).toBe(2214604925);
    });

    it("uses delegated votes for the threshold", () => {
      const low = withMembers([
        { account: ALICE, power: 60_000_000n },
        { account: BOB, power: 60_000_000n },
      ]);
      expect(errorCode(engine.propose(low, ALICE, 1000, 42))).toBe("BELOW_THRESHOLD");
      const delegated = unwrap(engine.delegate(low, BOB, ALICE));
      expect(engine.propose(delegated, ALICE, 1000, 42).ok).toBe(true);
    });

    it("votes with effective votes", () => {
      const view = unwrap(engine.describeProposal(voted(), PROPOSAL_ID, 2000));
      expect(view.state).toBe(ProposalState.Active);
      expect(view.proposal.forVotes).toBe(200_000_000n);
      expect(view.proposal.againstVotes).toBe(100_000_000n);
      expect(view.quorumRequired).toBe(12_000_000n);
      expect(view.quorumReached).toBe(true);
      expect(view.votes).toHaveLength(2);
      expect(view.operation).toBeUndefined();
    });

    it("reports unknown proposals", () => {
      expect(errorCode(engine.castVote(members, ALICE, 1, VoteSupport.For, 2000))).toBe(
        "PROPOSAL_NOT_FOUND",
      );
      expect(errorCode(engine.describeProposal(members, 1, 2000))).toBe("PROPOSAL_NOT_FOUND");
      expect(errorCode(engine.submitVoteIntent(members, ALICE, 1, VoteSupport.For))).toBe(
        "PROPOSAL_NOT_FOUND",
      );
    });

    it("records vote intents for known proposals", () => {
      const record = unwrap(engine.propose(members, ALICE, 1000, 42)).record;
      const withIntent = unwrap(engine.submitVoteIntent(record, BOB, PROPOSAL_ID, VoteSupport.Abstain));
      expect(withIntent.length).toBeGreaterThan(record.length);
    });

    it("cancels pending proposals for the proposer only", () => {
      const record = unwrap(engine.propose(members, ALICE, 1000, 42)).record;
      expect(errorCode(engine.cancel(record, BOB, PROPOSAL_ID, 1000))).toBe("NOT_PROPOSER");
      const canceled = unwrap(engine.cancel(record, ALICE, PROPOSAL_ID, 1000));
      expect(engine.listProposals(canceled, 1000)[0]?.state).toBe(ProposalState.Canceled);
    });
  });

  describe("queue", () => {
    it("schedules a succeeded proposal and marks it Queued", () => {
      const outcome = unwrap(engine.queue(voted(), PROPOSAL_ID, VOTE_END + 1));
      expect(outcome.operationId).toBe(OPERATION_ID);
      const view = unwrap(engine.describeProposal(outcome.record, PROPOSAL_ID, VOTE_END + 1));
      expect(view.state).toBe(ProposalState.Queued);
      expect(view.operation?.operation.readyAt).toBe(READY_AT);
      expect(view.operation?.state).toBe(OperationState.Pending);
    });

    it("describes the scheduled operation by id", () => {
      const view = unwrap(engine.describeOperation(queued(), OPERATION_ID, READY_AT));
      expect(view.operation.proposalId).toBe(PROPOSAL_ID);
      expect(view.state).toBe(OperationState.Ready);
      expect(errorCode(engine.describeOperation(queued(), 1, READY_AT))).toBe("PROPOSAL_NOT_FOUND");
    });

    it("rejects proposals that have not succeeded", () => {
      expect(errorCode(engine.queue(voted(), PROPOSAL_ID, 2000))).toBe("PROPOSAL_NOT_ACTIVE");
      expect(errorCode(engine.queue(queued(), PROPOSAL_ID, VOTE_END + 1))).toBe("PROPOSAL_NOT_ACTIVE");
    });
  });

  describe("execute", () => {
    it("requires the Executor role", () => {
      expect(errorCode(engine.execute(queued(), BOB, PROPOSAL_ID, READY_AT))).toBe("NOT_EXECUTOR");
    });

    it("waits for the timelock", () => {
      expect(errorCode(engine.execute(queued(), ALICE, PROPOSAL_ID, READY_AT - 1))).toBe("OP_NOT_READY");
    });

    it("marks the proposal Executed and releases the lock", () => {
      const record = unwrap(engine.execute(queued(), ALICE, PROPOSAL_ID, READY_AT));
      const view = unwrap(engine.describeProposal(record, PROPOSAL_ID, READY_AT));
      expect(view.state).toBe(ProposalState.Executed);
      expect(view.operation?.state).toBe(OperationState.Done);
      expect(isLocked(record)).toBe(false);
      expect(record.endsWith(";_lock=0")).toBe(true);
    });

    it("rejects nested execution while locked", () => {
      const locked = unwrap(engine.beginExecution(queued(), ALICE));
      expect(isLocked(locked)).toBe(true);
      expect(errorCode(engine.execute(locked, ALICE, PROPOSAL_ID, READY_AT))).toBe("REENTRANT");
      const done = unwrap(engine.completeExecution(locked, PROPOSAL_ID, READY_AT));
      expect(isLocked(done)).toBe(false);
    });

    it("fails for proposals with no operation", () => {
      expect(errorCode(engine.execute(voted(), ALICE, PROPOSAL_ID, READY_AT))).toBe("PROPOSAL_NOT_FOUND");
    });

    it("validates readiness without writing", () => {
      const record = queued();
      expect(unwrap(engine.validateExecution(record, PROPOSAL_ID, READY_AT))).toBe(0);
      expect(errorCode(engine.validateExecution(record, PROPOSAL_ID, READY_AT - 1))).toBe("OP_NOT_READY");
      expect(errorCode(engine.validateExecution(record, 12345, READY_AT))).toBe("PROPOSAL_NOT_FOUND");
      expect(
        errorCode(
          engine.validateExecution(record, PROPOSAL_ID, READY_AT + engine.params.timelockGracePeriod + 1),
        ),
      ).toBe("OP_EXPIRED");
    });
  });

  describe("snapshot", () => {
    it("stores the effective votes for an existing proposal", () => {
      const record = voted();
      const taken = unwrap(engine.snapshot(record, PROPOSAL_ID, BOB));
      expect(taken.votingPower).toBe(100_000_000n);
      expect(taken.record).toBe(`${record};snap_${String(PROPOSAL_ID)}_${hexOf(0xbb)}=100000000`);
    });

    it("rejects unknown proposals without writing", () => {
      expect(errorCode(engine.snapshot(members, 777, BOB))).toBe("PROPOSAL_NOT_FOUND");
    });
  });
});
