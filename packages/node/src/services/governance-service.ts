/**
 * GovernanceService — Composition root for the HTTP layer.
 *
 * Route handlers delegate to this service; they never touch the record
 * directly. Every mutation goes through a {@link GovernanceDispatcher}
 * scoped to the request's caller, and failures surface as
 * {@link GovernanceError} for the error handler to map.
 */

import type { Logger } from "pino";
import { GovernanceError, Role, sameAccount } from "@civitas/types";
import type { AccountId, Result } from "@civitas/types";
import { GovernanceEngine, findMember, setMember } from "@civitas/governance";
import type { GovernanceParams, MemberView, OperationView, ProposalView } from "@civitas/governance";
import { byteLength } from "@civitas/record";
import { GovernanceDispatcher } from "../dispatcher.js";
import type { DispatchReceipt, ExecutionHook, GovernanceAction } from "../dispatcher.js";
import { InMemoryHost } from "../host.js";
import type { GovernanceHost } from "../host.js";

// =============================================================================
// Configuration
// =============================================================================

export interface GovernanceServiceConfig {
  readonly params?: Partial<GovernanceParams> | undefined;
  /** Storage and clock. Defaults to an empty in-memory host. */
  readonly host?: GovernanceHost | undefined;
  readonly logger?: Logger | undefined;
  /** Seeded with Admin, Executor and Proposer when the record has no such member. */
  readonly adminAccount?: AccountId | undefined;
  readonly onExecute?: ExecutionHook | undefined;
}

export interface RecordSnapshot {
  readonly record: string;
  readonly bytes: number;
  readonly capacity: number;
}

export interface SnapshotReceipt {
  readonly proposalId: number;
  readonly votingPower: bigint;
}

const ADMIN_ROLES = Role.Admin | Role.Executor | Role.Proposer;

// =============================================================================
// Caller Scope
// =============================================================================

/** The shared host, answering with one request's caller. */
function scopeToCaller(host: GovernanceHost, caller: AccountId): GovernanceHost {
  return {
    readRecord: () => host.readRecord(),
    writeRecord: (record) => host.writeRecord(record),
    callerIdentity: () => caller,
    currentTime: () => host.currentTime(),
  };
}

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new GovernanceError(result.error.code, result.error.message);
  }
  return result.value;
}

// =============================================================================
// Service
// =============================================================================

export class GovernanceService {
  readonly engine: GovernanceEngine;
  readonly host: GovernanceHost;
  private readonly _logger: Logger | undefined;
  private readonly _onExecute: ExecutionHook | undefined;

  constructor(config: GovernanceServiceConfig = {}) {
    this.engine = new GovernanceEngine(config.params);
    this.host = config.host ?? new InMemoryHost();
    this._logger = config.logger;
    this._onExecute = config.onExecute;

    if (config.adminAccount !== undefined) {
      this._seedAdmin(config.adminAccount);
    }
  }

  // ─── Reads ───────────────────────────────────────────────────────

  now(): number {
    return this.host.currentTime();
  }

  getRecord(): RecordSnapshot {
    const record = this._read();
    return {
      record,
      bytes: byteLength(record),
      capacity: this.engine.params.recordCapacity,
    };
  }

  listMembers(): MemberView[] {
    return this.engine.listMembers(this._read());
  }

  getMember(account: AccountId): MemberView | undefined {
    return this.listMembers().find((m) => sameAccount(m.account, account));
  }

  listProposals(): ProposalView[] {
    return this.engine.listProposals(this._read(), this.now());
  }

  getProposal(proposalId: number): ProposalView {
    return unwrap(this.engine.describeProposal(this._read(), proposalId, this.now()));
  }

  getOperation(operationId: number): OperationView {
    return unwrap(this.engine.describeOperation(this._read(), operationId, this.now()));
  }

  // ─── Membership ──────────────────────────────────────────────────

  selfRegister(caller: AccountId): MemberView {
    this._dispatch(caller, { kind: "selfRegister" });
    return this._member(caller);
  }

  setVotingPower(caller: AccountId, account: AccountId, votingPower: bigint): MemberView {
    this._dispatch(caller, { kind: "setVotingPower", account, votingPower });
    return this._member(account);
  }

  grantRole(caller: AccountId, account: AccountId, role: number): MemberView {
    this._dispatch(caller, { kind: "grantRole", account, role });
    return this._member(account);
  }

  revokeRole(caller: AccountId, account: AccountId, role: number): MemberView {
    this._dispatch(caller, { kind: "revokeRole", account, role });
    return this._member(account);
  }

  delegate(caller: AccountId, target: AccountId): void {
    this._dispatch(caller, { kind: "delegate", target });
  }

  // ─── Proposals ───────────────────────────────────────────────────

  propose(caller: AccountId, descriptionHash?: number): ProposalView {
    const receipt = this._dispatch(caller, { kind: "propose", descriptionHash });
    return this.getProposal(this._proposalIdOf(receipt));
  }

  castVote(caller: AccountId, proposalId: number, support: number): ProposalView {
    this._dispatch(caller, { kind: "castVote", proposalId, support });
    return this.getProposal(proposalId);
  }

  submitVoteIntent(caller: AccountId, proposalId: number, support: number): void {
    this._dispatch(caller, { kind: "submitVoteIntent", proposalId, support });
  }

  snapshot(caller: AccountId, proposalId: number, account: AccountId): SnapshotReceipt {
    const receipt = this._dispatch(caller, { kind: "snapshot", proposalId, account });
    return { proposalId, votingPower: receipt.votingPower ?? 0n };
  }

  cancel(caller: AccountId, proposalId: number): ProposalView {
    this._dispatch(caller, { kind: "cancel", proposalId });
    return this.getProposal(proposalId);
  }

  queue(caller: AccountId, proposalId: number): ProposalView {
    this._dispatch(caller, { kind: "queue", proposalId });
    return this.getProposal(proposalId);
  }

  execute(caller: AccountId, proposalId: number): ProposalView {
    this._dispatch(caller, { kind: "execute", proposalId });
    return this.getProposal(proposalId);
  }

  // ─── Internal ────────────────────────────────────────────────────

  private _dispatch(caller: AccountId, action: GovernanceAction): DispatchReceipt {
    const dispatcher = new GovernanceDispatcher({
      host: scopeToCaller(this.host, caller),
      engine: this.engine,
      logger: this._logger,
      onExecute: this._onExecute,
    });
    return unwrap(dispatcher.dispatch(action));
  }

  private _read(): string {
    const record = this.host.readRecord();
    if (record === undefined) {
      throw new GovernanceError("DATA_READ", "Host could not read the record");
    }
    return record;
  }

  private _member(account: AccountId): MemberView {
    const member = this.getMember(account);
    if (member === undefined) {
      throw new GovernanceError("NOT_MEMBER", "Account is not a member");
    }
    return member;
  }

  private _proposalIdOf(receipt: DispatchReceipt): number {
    if (receipt.proposalId === undefined) {
      throw new GovernanceError("PROPOSAL_NOT_FOUND", "Dispatch returned no proposal id");
    }
    return receipt.proposalId;
  }

  private _seedAdmin(account: AccountId): void {
    const record = this._read();
    const existing = findMember(record, account);
    if (existing !== undefined && (existing.roles & ADMIN_ROLES) === ADMIN_ROLES) return;

    const seeded = unwrap(
      setMember(
        record,
        account,
        existing?.votingPower ?? 0n,
        (existing?.roles ?? 0) | ADMIN_ROLES,
        this.engine.params,
      ),
    );
    if (!this.host.writeRecord(seeded)) {
      throw new GovernanceError("HOST_CALL", "Host refused the seeded record");
    }
    this._logger?.info({ members: this.engine.listMembers(seeded).length }, "Admin account seeded");
  }
}
