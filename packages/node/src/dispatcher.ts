/**
 * @civitas/node — Action dispatcher.
 *
 * Runs one governance action against a host: verify the caller, read
 * the record and time, apply the engine, write the result back and
 * report an exit code.
 *
 * Rules:
 * - The caller is read twice; a mismatch fails with CALLER_VERIFICATION
 * - Nothing is written when an action fails
 * - An execution hook runs only for a Ready operation whose predecessor
 *   is Done, with the locked record stored, so a nested execute sees the
 *   lock and fails with REENTRANT
 * - The lock is released on every path after it was taken
 */

import type { Logger } from "pino";
import { exitCodeOf, fail, ok, sameAccount } from "@civitas/types";
import type { AccountId, Result } from "@civitas/types";
import { GovernanceEngine } from "@civitas/governance";
import { isU32 } from "@civitas/record";
import type { GovernanceHost } from "./host.js";

// =============================================================================
// Actions
// =============================================================================

export type GovernanceAction =
  | { readonly kind: "selfRegister" }
  | { readonly kind: "setVotingPower"; readonly account: AccountId; readonly votingPower: bigint }
  | { readonly kind: "grantRole"; readonly account: AccountId; readonly role: number }
  | { readonly kind: "revokeRole"; readonly account: AccountId; readonly role: number }
  | { readonly kind: "delegate"; readonly target: AccountId }
  | { readonly kind: "snapshot"; readonly proposalId: number; readonly account: AccountId }
  | { readonly kind: "propose"; readonly descriptionHash?: number | undefined }
  | { readonly kind: "castVote"; readonly proposalId: number; readonly support: number }
  | { readonly kind: "submitVoteIntent"; readonly proposalId: number; readonly support: number }
  | { readonly kind: "cancel"; readonly proposalId: number }
  | { readonly kind: "queue"; readonly proposalId: number }
  | { readonly kind: "execute"; readonly proposalId: number };

export type ActionKind = GovernanceAction["kind"];

export interface DispatchReceipt {
  readonly action: ActionKind;
  readonly record: string;
  readonly proposalId?: number | undefined;
  readonly operationId?: number | undefined;
  readonly votingPower?: bigint | undefined;
}

export interface ExecutionContext {
  readonly proposalId: number;
  readonly caller: AccountId;
  readonly now: number;
}

/** Side effect run while an execution holds the lock. */
export type ExecutionHook = (context: ExecutionContext) => void;

export interface DispatcherOptions {
  readonly host: GovernanceHost;
  readonly engine?: GovernanceEngine | undefined;
  readonly logger?: Logger | undefined;
  readonly onExecute?: ExecutionHook | undefined;
}

// =============================================================================
// Dispatcher
// =============================================================================

export class GovernanceDispatcher {
  readonly engine: GovernanceEngine;
  private readonly _host: GovernanceHost;
  private readonly _logger: Logger | undefined;
  private readonly _onExecute: ExecutionHook | undefined;

  constructor(options: DispatcherOptions) {
    this._host = options.host;
    this.engine = options.engine ?? new GovernanceEngine();
    this._logger = options.logger;
    this._onExecute = options.onExecute;
  }

  /** Run `action` and return its receipt or failure. */
  dispatch(action: GovernanceAction): Result<DispatchReceipt> {
    const result = this._run(action);
    this._log(action.kind, result);
    return result;
  }

  /** Run `action` and return only its exit code. */
  dispatchExitCode(action: GovernanceAction): number {
    return exitCodeOf(this.dispatch(action));
  }

  // ─── Internal ────────────────────────────────────────────────────

  private _run(action: GovernanceAction): Result<DispatchReceipt> {
    const caller = this._verifyCaller();
    if (!caller.ok) return caller;

    const record = this._host.readRecord();
    if (record === undefined) {
      return fail("DATA_READ", "Host could not read the record");
    }

    const now = this._host.currentTime();
    if (!isU32(now)) {
      return fail("HOST_CALL", `Host returned an invalid time: ${String(now)}`);
    }

    if (action.kind === "execute") {
      return this._execute(record, caller.value, action.proposalId, now);
    }

    const applied = this._apply(action, record, caller.value, now);
    if (!applied.ok) return applied;
    return this._commit(applied.value);
  }

  private _verifyCaller(): Result<AccountId> {
    const first = this._host.callerIdentity();
    if (first === undefined) {
      return fail("HOST_CALL", "Host did not identify the caller");
    }
    const second = this._host.callerIdentity();
    if (second === undefined || !sameAccount(first, second)) {
      return fail("CALLER_VERIFICATION", "Caller identity changed between reads");
    }
    return ok(first);
  }

  private _apply(
    action: Exclude<GovernanceAction, { kind: "execute" }>,
    record: string,
    caller: AccountId,
    now: number,
  ): Result<DispatchReceipt> {
    const engine = this.engine;
    const receipt = (next: Result<string>): Result<DispatchReceipt> =>
      next.ok ? ok({ action: action.kind, record: next.value }) : next;

    switch (action.kind) {
      case "selfRegister":
        return receipt(engine.selfRegister(record, caller));
      case "setVotingPower":
        return receipt(engine.setVotingPower(record, caller, action.account, action.votingPower));
      case "grantRole":
        return receipt(engine.grantRole(record, caller, action.account, action.role));
      case "revokeRole":
        return receipt(engine.revokeRole(record, caller, action.account, action.role));
      case "delegate":
        return receipt(engine.delegate(record, caller, action.target));
      case "castVote":
        return receipt(engine.castVote(record, caller, action.proposalId, action.support, now));
      case "submitVoteIntent":
        return receipt(engine.submitVoteIntent(record, caller, action.proposalId, action.support));
      case "cancel":
        return receipt(engine.cancel(record, caller, action.proposalId, now));
      case "snapshot": {
        const taken = engine.snapshot(record, action.proposalId, action.account);
        if (!taken.ok) return taken;
        return ok({
          action: action.kind,
          record: taken.value.record,
          proposalId: action.proposalId,
          votingPower: taken.value.votingPower,
        });
      }
      case "propose": {
        const proposed = engine.propose(record, caller, now, action.descriptionHash);
        if (!proposed.ok) return proposed;
        return ok({
          action: action.kind,
          record: proposed.value.record,
          proposalId: proposed.value.proposalId,
        });
      }
      case "queue": {
        const queued = engine.queue(record, action.proposalId, now);
        if (!queued.ok) return queued;
        return ok({
          action: action.kind,
          record: queued.value.record,
          proposalId: action.proposalId,
          operationId: queued.value.operationId,
        });
      }
    }
  }

  private _execute(
    record: string,
    caller: AccountId,
    proposalId: number,
    now: number,
  ): Result<DispatchReceipt> {
    if (this._onExecute === undefined) {
      const executed = this.engine.execute(record, caller, proposalId, now);
      if (!executed.ok) return executed;
      return this._commit({ action: "execute", record: executed.value, proposalId });
    }

    const locked = this.engine.beginExecution(record, caller);
    if (!locked.ok) return locked;
    const executable = this.engine.validateExecution(locked.value, proposalId, now);
    if (!executable.ok) return executable;
    if (!this._host.writeRecord(locked.value)) {
      return fail("HOST_CALL", "Host refused the locked record");
    }

    try {
      this._onExecute({ proposalId, caller, now });
    } catch (err: unknown) {
      this._release(locked.value);
      throw err;
    }

    const current = this._host.readRecord();
    if (current === undefined) {
      return fail("DATA_READ", "Host could not read the record after execution");
    }

    const completed = this.engine.completeExecution(current, proposalId, now);
    if (!completed.ok) {
      const released = this._release(current);
      return released.ok ? completed : released;
    }
    return this._commit({ action: "execute", record: completed.value, proposalId });
  }

  private _release(record: string): Result<string> {
    const released = this.engine.releaseLock(record);
    if (!released.ok) return released;
    if (!this._host.writeRecord(released.value)) {
      return fail("HOST_CALL", "Host refused the released record");
    }
    return released;
  }

  private _commit(receipt: DispatchReceipt): Result<DispatchReceipt> {
    if (!this._host.writeRecord(receipt.record)) {
      return fail("HOST_CALL", "Host refused the record write");
    }
    return ok(receipt);
  }

  private _log(action: ActionKind, result: Result<DispatchReceipt>): void {
    if (this._logger === undefined) return;
    const exitCode = exitCodeOf(result);
    if (result.ok) {
      this._logger.info({ action, code: "SUCCESS", exitCode }, `${action} succeeded`);
    } else {
      this._logger.warn(
        { action, code: result.error.code, exitCode },
        `${action} failed: ${result.error.message}`,
      );
    }
  }
}
