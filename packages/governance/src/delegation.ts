/**
 * @civitas/governance — Delegation and voting power snapshots.
 *
 * Rules:
 * - No delegation entry means the account delegates to itself
 * - Delegation is single-level: if a delegates to b and b to c, a's power
 *   counts for b's delegate resolution only, never for c
 * - A snapshot is written once per (proposal, account) and never changes
 */

import { ok, sameAccount } from "@civitas/types";
import type { AccountId, Result } from "@civitas/types";
import {
  RecordDraft,
  accountIdFromHex,
  accountIdToHex,
  findValue,
  formatU64,
  parseU64,
  saturatingAddU64,
} from "@civitas/record";
import { DEFAULT_GOVERNANCE_PARAMS } from "./params.js";
import type { GovernanceParams } from "./params.js";
import { delegateKey, snapshotKey } from "./layout.js";
import { getVotes, listMembers } from "./membership.js";

export interface SnapshotOutcome {
  readonly record: string;
  readonly votingPower: bigint;
}

/**
 * Delegate `voter`'s votes to `target`. Delegating to oneself removes
 * any stored delegation.
 */
export function delegate(
  record: string,
  voter: AccountId,
  target: AccountId,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  const key = delegateKey(accountIdToHex(voter));
  const draft = new RecordDraft(record);

  if (sameAccount(voter, target)) {
    draft.remove(key);
  } else {
    draft.set(key, accountIdToHex(target));
  }
  return draft.encode(params.recordCapacity);
}

/** The account `account` delegates to; itself when nothing is stored. */
export function getDelegate(record: string, account: AccountId): AccountId {
  const stored = findValue(record, delegateKey(accountIdToHex(account)));
  if (stored === undefined) return account;
  return accountIdFromHex(stored) ?? account;
}

/**
 * Own power when self-delegated, plus the base power of every other
 * member that delegates directly to `account`.
 */
export function getEffectiveVotes(record: string, account: AccountId): bigint {
  let total = 0n;

  if (sameAccount(getDelegate(record, account), account)) {
    total = getVotes(record, account);
  }

  for (const member of listMembers(record)) {
    if (sameAccount(member.account, account)) continue;
    if (sameAccount(getDelegate(record, member.account), account)) {
      total = saturatingAddU64(total, member.votingPower);
    }
  }

  return total;
}

/**
 * Record `account`'s effective votes for `proposalId`. When a snapshot
 * already exists the record is returned unchanged with the stored power.
 */
export function snapshotVotingPower(
  record: string,
  proposalId: number,
  account: AccountId,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<SnapshotOutcome> {
  const key = snapshotKey(proposalId, accountIdToHex(account));
  const existing = findValue(record, key);
  const stored = existing === undefined ? undefined : parseU64(existing);
  if (stored !== undefined) {
    return ok({ record, votingPower: stored });
  }

  const votingPower = getEffectiveVotes(record, account);
  const encoded = new RecordDraft(record)
    .set(key, formatU64(votingPower))
    .encode(params.recordCapacity);
  if (!encoded.ok) return encoded;
  return ok({ record: encoded.value, votingPower });
}

/** Snapshotted power, 0 when no snapshot exists. */
export function getSnapshotVotes(record: string, proposalId: number, account: AccountId): bigint {
  const value = findValue(record, snapshotKey(proposalId, accountIdToHex(account)));
  return value === undefined ? 0n : (parseU64(value) ?? 0n);
}
