/**
 * @civitas/governance — Timelock scheduler.
 *
 * Operations move Unset → Pending → Ready → Done. A Pending operation
 * becomes Ready at readyAt and Expired once the grace period has passed.
 * Cancellation returns it to Unset.
 *
 * Rules:
 * - delay must be at least timelockMinDelay
 * - At most one non-terminal (Pending or Ready) operation per proposal
 * - A predecessor, when set, must be Done before execution; chains are
 *   not followed past one level
 */

import { OperationState, fail, isOperationState, ok } from "@civitas/types";
import type { Result, TimelockOperation } from "@civitas/types";
import {
  MAX_KEY_INDEX,
  RecordDraft,
  checkedAddU32,
  findValue,
  formatU32,
  parseCount,
  parseU32,
  saturatingAddU32,
} from "@civitas/record";
import { DEFAULT_GOVERNANCE_PARAMS } from "./params.js";
import type { GovernanceParams } from "./params.js";
import { hashOperation } from "./hash.js";
import { OPERATION_COUNT_KEY, operationKey, readCount } from "./layout.js";
import type { OperationField } from "./layout.js";

export interface ScheduleOutcome {
  readonly record: string;
  readonly operationId: number;
  readonly index: number;
}

const LIVE_STATES: ReadonlySet<OperationState> = new Set<OperationState>([
  OperationState.Pending,
  OperationState.Ready,
]);

// ─── Field Access ────────────────────────────────────────────────────────

function readU32(record: string, index: number, field: OperationField): number {
  const value = findValue(record, operationKey(index, field));
  return value === undefined ? 0 : (parseU32(value) ?? 0);
}

function readStoredState(record: string, index: number): OperationState {
  const value = findValue(record, operationKey(index, "state"));
  const parsed = value === undefined ? undefined : parseCount(value);
  return isOperationState(parsed) ? parsed : OperationState.Unset;
}

// ─── Queries ─────────────────────────────────────────────────────────────

export function getOperationCount(record: string): number {
  return readCount(record, OPERATION_COUNT_KEY);
}

export function readOperation(record: string, index: number): TimelockOperation | undefined {
  const idText = findValue(record, operationKey(index, "id"));
  const id = idText === undefined ? undefined : parseU32(idText);
  if (id === undefined) return undefined;

  return {
    index,
    id,
    proposalId: readU32(record, index, "prop"),
    readyAt: readU32(record, index, "ready"),
    storedState: readStoredState(record, index),
    predecessorId: readU32(record, index, "predecessor"),
  };
}

export function listOperations(record: string): TimelockOperation[] {
  const operations: TimelockOperation[] = [];
  const count = getOperationCount(record);
  for (let index = 0; index < count; index++) {
    const op = readOperation(record, index);
    if (op !== undefined) operations.push(op);
  }
  return operations;
}

/**
 * Current state of the operation at `index`. Only a stored Pending is
 * re-derived from time; any other stored state is returned as-is.
 */
export function getOperationState(
  record: string,
  index: number,
  now: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): OperationState {
  const stored = readStoredState(record, index);
  if (stored !== OperationState.Pending) return stored;

  const readyAt = readU32(record, index, "ready");
  if (now < readyAt) return OperationState.Pending;
  if (now > saturatingAddU32(readyAt, params.timelockGracePeriod)) return OperationState.Expired;
  return OperationState.Ready;
}

/** The most recently scheduled operation linked to `proposalId`. */
export function findOperationByProposal(record: string, proposalId: number): Result<number> {
  const target = formatU32(proposalId);
  for (let index = getOperationCount(record) - 1; index >= 0; index--) {
    if (findValue(record, operationKey(index, "prop")) === target) {
      return ok(index);
    }
  }
  return fail("PROPOSAL_NOT_FOUND", `No operation scheduled for proposal ${target}`);
}

export function findOperationById(record: string, operationId: number): Result<number> {
  const target = formatU32(operationId);
  const count = getOperationCount(record);
  for (let index = 0; index < count; index++) {
    if (findValue(record, operationKey(index, "id")) === target) {
      return ok(index);
    }
  }
  return fail("PROPOSAL_NOT_FOUND", `No operation with id ${target}`);
}

/** Predecessor operation id, 0 when none was recorded. */
export function getPredecessor(record: string, index: number): number {
  return readU32(record, index, "predecessor");
}

// ─── Scheduling ──────────────────────────────────────────────────────────

function scheduleInto(
  record: string,
  proposalId: number,
  now: number,
  delay: number,
  predecessorId: number | undefined,
  params: GovernanceParams,
): Result<ScheduleOutcome> {
  if (delay < params.timelockMinDelay) {
    return fail(
      "TOO_EARLY",
      `Delay ${String(delay)} is below the minimum of ${String(params.timelockMinDelay)}`,
    );
  }

  const count = getOperationCount(record);
  for (let index = 0; index < count; index++) {
    if (
      readU32(record, index, "prop") === proposalId &&
      LIVE_STATES.has(getOperationState(record, index, now, params))
    ) {
      return fail("OP_ALREADY_QUEUED", `Proposal ${String(proposalId)} already has an operation`);
    }
  }

  if (count > MAX_KEY_INDEX) {
    return fail("RECORD_FULL", "No operation slots left");
  }

  const readyAt = checkedAddU32(now, delay);
  if (readyAt === undefined) {
    return fail("OVERFLOW", `Ready time ${String(now)} + ${String(delay)} exceeds u32 time`);
  }

  const operationId = hashOperation(proposalId, now, count);
  const draft = new RecordDraft(record)
    .remove(OPERATION_COUNT_KEY)
    .append(OPERATION_COUNT_KEY, formatU32(count + 1))
    .append(operationKey(count, "id"), formatU32(operationId))
    .append(operationKey(count, "prop"), formatU32(proposalId))
    .append(operationKey(count, "ready"), formatU32(readyAt))
    .append(operationKey(count, "state"), formatU32(OperationState.Pending));
  if (predecessorId !== undefined) {
    draft.append(operationKey(count, "predecessor"), formatU32(predecessorId));
  }

  const encoded = draft.encode(params.recordCapacity);
  if (!encoded.ok) return encoded;
  return ok({ record: encoded.value, operationId, index: count });
}

export function schedule(
  record: string,
  proposalId: number,
  now: number,
  delay: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<ScheduleOutcome> {
  return scheduleInto(record, proposalId, now, delay, undefined, params);
}

/** Schedule with a dependency on `predecessorId` (0 for none). */
export function scheduleWithPredecessor(
  record: string,
  proposalId: number,
  predecessorId: number,
  now: number,
  delay: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<ScheduleOutcome> {
  return scheduleInto(record, proposalId, now, delay, predecessorId, params);
}

// ─── Transitions ─────────────────────────────────────────────────────────

function writeState(
  record: string,
  index: number,
  state: OperationState,
  params: GovernanceParams,
): Result<string> {
  const draft = new RecordDraft(record);
  if (!draft.replace(operationKey(index, "state"), formatU32(state))) {
    return fail("OP_NOT_READY", `No operation at index ${String(index)}`);
  }
  return draft.encode(params.recordCapacity);
}

function requireReady(
  record: string,
  index: number,
  now: number,
  params: GovernanceParams,
): Result<number> {
  const state = getOperationState(record, index, now, params);
  if (state === OperationState.Expired) {
    return fail("OP_EXPIRED", `Operation ${String(index)} expired`);
  }
  if (state !== OperationState.Ready) {
    return fail("OP_NOT_READY", `Operation ${String(index)} is in state ${String(state)}, not Ready`);
  }
  return ok(index);
}

export function executeOperation(
  record: string,
  index: number,
  now: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  const ready = requireReady(record, index, now, params);
  if (!ready.ok) return ready;
  return writeState(record, index, OperationState.Done, params);
}

/**
 * Check, without writing, that the operation at `index` is Ready and
 * its predecessor, when set, is Done. Returns the index.
 */
export function checkExecutable(
  record: string,
  index: number,
  now: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<number> {
  const predecessorId = getPredecessor(record, index);
  if (predecessorId !== 0) {
    const found = findOperationById(record, predecessorId);
    if (!found.ok || readStoredState(record, found.value) !== OperationState.Done) {
      return fail("OP_NOT_READY", `Predecessor ${String(predecessorId)} is not done`);
    }
  }
  return requireReady(record, index, now, params);
}

/** {@link executeOperation}, after {@link checkExecutable}. */
export function executeWithPredecessorCheck(
  record: string,
  index: number,
  now: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  const checked = checkExecutable(record, index, now, params);
  if (!checked.ok) return checked;
  return writeState(record, index, OperationState.Done, params);
}

export function cancelOperation(
  record: string,
  index: number,
  now: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  const state = getOperationState(record, index, now, params);
  if (state !== OperationState.Pending && state !== OperationState.Ready) {
    return fail("OP_NOT_READY", `Operation ${String(index)} cannot be canceled in state ${String(state)}`);
  }
  return writeState(record, index, OperationState.Unset, params);
}
