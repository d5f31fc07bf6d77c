import { describe, it, expect } from "vitest";
import { OperationState } from "@civitas/types";
import {
  cancelOperation,
  checkExecutable,
  executeOperation,
  executeWithPredecessorCheck,
  findOperationById,
  findOperationByProposal,
  getOperationState,
  getPredecessor,
  listOperations,
  readOperation,
  schedule,
  scheduleWithPredecessor,
} from "../src/timelock.js";
import { errorCode, unwrap } from "./helpers.js";

const DELAY = 172_800;
const GRACE = 1_209_600;
const READY_AT = 173_800;

const scheduled = unwrap(schedule("", 7, 1000, DELAY));
const record = scheduled.record;

describe("schedule", () => {
  it("appends the operation after its count", () => {
    expect(scheduled.operationId).toBe(2995937141);
    expect(scheduled.index).toBe(0);
    expect(record).toBe("op_count=1;op_0_id=2995937141;op_0_prop=7;op_0_ready=173800;op_0_state=1");
  });

  it("rejects delays below the minimum", () => {
    expect(errorCode(schedule("", 7, 1000, DELAY - 1))).toBe("TOO_EARLY");
  });

  it("rejects ready times past u32 time", () => {
    expect(errorCode(schedule("", 7, 0xffff_ffff - 100, DELAY))).toBe("OVERFLOW");
  });

  it("allows one pending or ready operation per proposal", () => {
    expect(errorCode(schedule(record, 7, 1000, DELAY))).toBe("OP_ALREADY_QUEUED");
    expect(errorCode(schedule(record, 7, READY_AT, DELAY))).toBe("OP_ALREADY_QUEUED");
  });

  it("allows rescheduling after execution", () => {
    const done = unwrap(executeOperation(record, 0, READY_AT));
    const again = unwrap(schedule(done, 7, READY_AT, DELAY));
    expect(again.index).toBe(1);
    expect(unwrap(findOperationByProposal(again.record, 7))).toBe(1);
  });

  it("allows rescheduling after cancellation", () => {
    const canceled = unwrap(cancelOperation(record, 0, 1000));
    const again = unwrap(schedule(canceled, 7, 1000, DELAY));
    expect(again.index).toBe(1);
    expect(again.operationId).toBe(3025372827);
    expect(unwrap(findOperationByProposal(again.record, 7))).toBe(1);
  });

  it("allows rescheduling after expiry", () => {
    expect(schedule(record, 7, READY_AT + GRACE + 1, DELAY).ok).toBe(true);
  });
});

describe("getOperationState", () => {
  it("moves from Pending to Ready to Expired", () => {
    expect(getOperationState(record, 0, 100_000)).toBe(OperationState.Pending);
    expect(getOperationState(record, 0, READY_AT - 1)).toBe(OperationState.Pending);
    expect(getOperationState(record, 0, READY_AT)).toBe(OperationState.Ready);
    expect(getOperationState(record, 0, READY_AT + GRACE / 2)).toBe(OperationState.Ready);
    expect(getOperationState(record, 0, READY_AT + GRACE)).toBe(OperationState.Ready);
    expect(getOperationState(record, 0, READY_AT + GRACE + 1)).toBe(OperationState.Expired);
  });

  it("reports Unset for a missing operation", () => {
    expect(getOperationState(record, 5, READY_AT)).toBe(OperationState.Unset);
  });
});

describe("executeOperation", () => {
  it("marks a ready operation Done", () => {
    const done = unwrap(executeOperation(record, 0, READY_AT));
    expect(done).toBe(record.replace("op_0_state=1", "op_0_state=3"));
    expect(getOperationState(done, 0, READY_AT + GRACE + 10)).toBe(OperationState.Done);
  });

  it("rejects pending, expired and finished operations", () => {
    expect(errorCode(executeOperation(record, 0, READY_AT - 1))).toBe("OP_NOT_READY");
    expect(errorCode(executeOperation(record, 0, READY_AT + GRACE + 1))).toBe("OP_EXPIRED");
    const done = unwrap(executeOperation(record, 0, READY_AT));
    expect(errorCode(executeOperation(done, 0, READY_AT))).toBe("OP_NOT_READY");
  });
});

describe("cancelOperation", () => {
  it("returns a pending or ready operation to Unset", () => {
    expect(unwrap(cancelOperation(record, 0, 1000))).toBe(record.replace("op_0_state=1", "op_0_state=0"));
    expect(cancelOperation(record, 0, READY_AT).ok).toBe(true);
  });

  it("rejects expired and done operations", () => {
    expect(errorCode(cancelOperation(record, 0, READY_AT + GRACE + 1))).toBe("OP_NOT_READY");
    const done = unwrap(executeOperation(record, 0, READY_AT));
    expect(errorCode(cancelOperation(done, 0, READY_AT))).toBe("OP_NOT_READY");
  });
});

describe("predecessors", () => {
  const chained = unwrap(scheduleWithPredecessor(record, 9, 2995937141, 1000, DELAY));

  it("stores the predecessor id", () => {
    expect(chained.operationId).toBe(2161376277);
    expect(chained.record).toBe(
      "op_0_id=2995937141;op_0_prop=7;op_0_ready=173800;op_0_state=1;" +
        "op_count=2;op_1_id=2161376277;op_1_prop=9;op_1_ready=173800;op_1_state=1;" +
        "op_1_predecessor=2995937141",
    );
    expect(getPredecessor(chained.record, 1)).toBe(2995937141);
    expect(getPredecessor(chained.record, 0)).toBe(0);
  });

  it("blocks execution until the predecessor is Done", () => {
    expect(errorCode(executeWithPredecessorCheck(chained.record, 1, READY_AT))).toBe("OP_NOT_READY");
    const first = unwrap(executeWithPredecessorCheck(chained.record, 0, READY_AT));
    const second = unwrap(executeWithPredecessorCheck(first, 1, READY_AT));
    expect(listOperations(second).map((op) => op.storedState)).toEqual([
      OperationState.Done,
      OperationState.Done,
    ]);
  });

  it("checks readiness without writing", () => {
    expect(errorCode(checkExecutable(chained.record, 1, READY_AT))).toBe("OP_NOT_READY");
    expect(unwrap(checkExecutable(chained.record, 0, READY_AT))).toBe(0);
    expect(errorCode(checkExecutable(chained.record, 0, READY_AT - 1))).toBe("OP_NOT_READY");
    expect(errorCode(checkExecutable(chained.record, 0, READY_AT + GRACE + 1))).toBe("OP_EXPIRED");
  });

  it("blocks execution when the predecessor is unknown", () => {
    const orphan = unwrap(scheduleWithPredecessor("", 9, 12345, 1000, DELAY));
    expect(errorCode(executeWithPredecessorCheck(orphan.record, 0, READY_AT))).toBe("OP_NOT_READY");
  });
});

describe("lookups", () => {
  it("reads operations by index and id", () => {
    expect(readOperation(record, 0)).toEqual({
      index: 0,
      id: 2995937141,
      proposalId: 7,
      readyAt: READY_AT,
      storedState: OperationState.Pending,
      predecessorId: 0,
    });
    expect(unwrap(findOperationById(record, 2995937141))).toBe(0);
    expect(errorCode(findOperationById(record, 1))).toBe("PROPOSAL_NOT_FOUND");
    expect(errorCode(findOperationByProposal(record, 8))).toBe("PROPOSAL_NOT_FOUND");
  });
});
