/**
 * @civitas/governance — Membership ledger.
 *
 * Members carry a base voting power and a role bitmask. Entries are
 * updated in place at their index and never deleted.
 *
 * Rules:
 * - One entry per account, matched by stored hex identifier
 * - Member count never exceeds maxMembers
 * - Granting or revoking a role never changes voting power
 * - Aggregates saturate instead of failing
 */

import { fail, isRoleMask, sameAccount } from "@civitas/types";
import type { AccountId, Member, Result } from "@civitas/types";
import {
  RecordDraft,
  accountIdFromHex,
  accountIdToHex,
  findValue,
  formatU32,
  formatU64,
  isU64,
  parseCount,
  parseU64,
  saturatingAddU64,
  saturatingMulU64,
} from "@civitas/record";
import { DEFAULT_GOVERNANCE_PARAMS } from "./params.js";
import type { GovernanceParams } from "./params.js";
import { MEMBER_COUNT_KEY, memberKey, readCount } from "./layout.js";

/** A member together with its slot in the record. */
export interface MemberEntry extends Member {
  readonly index: number;
}

// ─── Encoding ────────────────────────────────────────────────────────────

function formatMember(account: AccountId, votingPower: bigint, roles: number): string {
  return `${accountIdToHex(account)}:${formatU64(votingPower)}:${formatU32(roles)}`;
}

function parseMember(value: string): Member | undefined {
  const parts = value.split(":");
  if (parts.length !== 3) return undefined;
  const [hex = "", power = "", roles = ""] = parts;

  const account = accountIdFromHex(hex);
  const votingPower = parseU64(power);
  const roleMask = parseCount(roles);
  if (account === undefined || votingPower === undefined || roleMask === undefined) {
    return undefined;
  }
  return { account, votingPower, roles: roleMask };
}

// ─── Queries ─────────────────────────────────────────────────────────────

export function getMemberCount(record: string): number {
  return readCount(record, MEMBER_COUNT_KEY);
}

export function listMembers(record: string): MemberEntry[] {
  const members: MemberEntry[] = [];
  const count = getMemberCount(record);
  for (let index = 0; index < count; index++) {
    const value = findValue(record, memberKey(index));
    const member = value === undefined ? undefined : parseMember(value);
    if (member !== undefined) {
      members.push({ ...member, index });
    }
  }
  return members;
}

export function findMember(record: string, account: AccountId): MemberEntry | undefined {
  return listMembers(record).find((m) => sameAccount(m.account, account));
}

/** Base voting power, 0 for non-members. */
export function getVotes(record: string, account: AccountId): bigint {
  return findMember(record, account)?.votingPower ?? 0n;
}

export function getRoles(record: string, account: AccountId): number {
  return findMember(record, account)?.roles ?? 0;
}

export function hasRole(record: string, account: AccountId, role: number): boolean {
  return (getRoles(record, account) & role) !== 0;
}

export function getTotalVotingPower(record: string): bigint {
  let total = 0n;
  for (const member of listMembers(record)) {
    total = saturatingAddU64(total, member.votingPower);
  }
  return total;
}

/** Votes required for quorum: floor(total / 100) * quorumPercentage. */
export function quorum(
  totalVotingPower: bigint,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): bigint {
  return saturatingMulU64(totalVotingPower / 100n, params.quorumPercentage);
}

// ─── Mutations ───────────────────────────────────────────────────────────

/**
 * Add or update a member.
 *
 * An existing member is rewritten at its index. A new member gets the
 * next index and member_count moves to the end of the record.
 */
export function setMember(
  record: string,
  account: AccountId,
  votingPower: bigint,
  roles: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  if (!isU64(votingPower)) {
    return fail("OVERFLOW", `Voting power out of range: ${votingPower.toString()}`);
  }
  if (!isRoleMask(roles)) {
    return fail("BAD_CONFIG", `Invalid role mask: ${String(roles)}`);
  }

  const value = formatMember(account, votingPower, roles);
  const draft = new RecordDraft(record);
  const existing = findMember(record, account);

  if (existing !== undefined) {
    if (!draft.replace(memberKey(existing.index), value)) {
      return fail("DATA_READ", `Member entry ${String(existing.index)} disappeared`);
    }
    return draft.encode(params.recordCapacity);
  }

  const count = getMemberCount(record);
  if (count >= params.maxMembers) {
    return fail("BAD_CONFIG", `Member limit reached (${String(params.maxMembers)})`);
  }

  draft
    .remove(MEMBER_COUNT_KEY)
    .append(MEMBER_COUNT_KEY, formatU32(count + 1))
    .append(memberKey(count), value);
  return draft.encode(params.recordCapacity);
}

export function grantRole(
  record: string,
  account: AccountId,
  role: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  const member = findMember(record, account);
  return setMember(
    record,
    account,
    member?.votingPower ?? 0n,
    (member?.roles ?? 0) | role,
    params,
  );
}

export function revokeRole(
  record: string,
  account: AccountId,
  role: number,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  const member = findMember(record, account);
  return setMember(
    record,
    account,
    member?.votingPower ?? 0n,
    (member?.roles ?? 0) & ~role & 0xff,
    params,
  );
}
