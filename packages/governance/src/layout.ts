/**
 * @civitas/governance — Record layout.
 *
 * Key construction for every entity stored in the ledger record:
 *
 *   proposal_count=2
 *   prop_0_id=…;prop_0_proposer=<hex40>;prop_0_state=0;…
 *   member_count=1;member_0=<hex40>:<power>:<roles>
 *   vote_0_0=<hex40>:<support>:<weight>
 *   delegate_<hex40>=<hex40>
 *   snap_<proposalId>_<hex40>=<power>
 *   op_count=1;op_0_id=…;op_0_prop=…;op_0_ready=…;op_0_state=1
 *   sigvote_<proposalId>_<hex40>=<support>
 *   _lock=0
 */

import { findValue, formatU32, indexedKey, parseCount } from "@civitas/record";

export const PROPOSAL_COUNT_KEY = "proposal_count";
export const MEMBER_COUNT_KEY = "member_count";
export const OPERATION_COUNT_KEY = "op_count";
export const LOCK_KEY = "_lock";

export type ProposalField =
  | "id"
  | "proposer"
  | "state"
  | "start"
  | "end"
  | "for"
  | "against"
  | "abstain"
  | "desc";

export type OperationField = "id" | "prop" | "ready" | "state" | "predecessor";

export function proposalKey(index: number, field: ProposalField): string {
  return indexedKey("prop_", index, `_${field}`);
}

export function memberKey(index: number): string {
  return indexedKey("member_", index);
}

export function voteKey(proposalIndex: number, voteIndex: number): string {
  return indexedKey(indexedKey("vote_", proposalIndex, "_"), voteIndex);
}

export function operationKey(index: number, field: OperationField): string {
  return indexedKey("op_", index, `_${field}`);
}

export function delegateKey(accountHex: string): string {
  return `delegate_${accountHex}`;
}

export function snapshotKey(proposalId: number, accountHex: string): string {
  return `snap_${formatU32(proposalId)}_${accountHex}`;
}

export function voteIntentKey(proposalId: number, accountHex: string): string {
  return `sigvote_${formatU32(proposalId)}_${accountHex}`;
}

/** Counter value, 0 when absent or malformed. */
export function readCount(record: string, key: string): number {
  const value = findValue(record, key);
  return value === undefined ? 0 : (parseCount(value) ?? 0);
}
