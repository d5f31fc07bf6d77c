/**
 * @civitas/governance — Vote-by-signature intents.
 *
 * A signed vote binds domain, action, proposal, support and voter in a
 * fixed text message. The engine records the intent; verifying the
 * signature itself belongs to the host.
 */

import { fail, isVoteSupport, isZeroAccount } from "@civitas/types";
import type { AccountId, Result, VoteSupport } from "@civitas/types";
import {
  RecordDraft,
  accountIdToHex,
  findValue,
  formatU32,
  parseCount,
} from "@civitas/record";
import { DEFAULT_GOVERNANCE_PARAMS } from "./params.js";
import type { GovernanceParams } from "./params.js";
import { digest64 } from "./hash.js";
import { voteIntentKey } from "./layout.js";

export const VOTE_MESSAGE_PREFIX = "civitas:vote:";

export function buildVoteMessage(proposalId: number, support: VoteSupport, voter: AccountId): string {
  return `${VOTE_MESSAGE_PREFIX}${formatU32(proposalId)}:${String(support)}:${accountIdToHex(voter)}`;
}

/** 32-bit digest of a vote message. Unlike ids, zero is possible. */
export function hashVoteMessage(message: string): number {
  return Number(BigInt.asUintN(32, digest64([new TextEncoder().encode(message)])));
}

export function validateVoteMessage(proposalId: number, support: number, voter: AccountId): boolean {
  return isVoteSupport(support) && proposalId !== 0 && !isZeroAccount(voter);
}

export function recordVoteIntent(
  record: string,
  proposalId: number,
  support: number,
  voter: AccountId,
  params: GovernanceParams = DEFAULT_GOVERNANCE_PARAMS,
): Result<string> {
  if (!validateVoteMessage(proposalId, support, voter)) {
    return fail("INVALID_VOTE", "Malformed vote intent");
  }
  const key = voteIntentKey(proposalId, accountIdToHex(voter));
  if (findValue(record, key) !== undefined) {
    return fail("ALREADY_VOTED", `Vote intent already recorded for ${accountIdToHex(voter)}`);
  }
  return new RecordDraft(record).append(key, formatU32(support)).encode(params.recordCapacity);
}

export function getVoteIntent(
  record: string,
  proposalId: number,
  voter: AccountId,
): VoteSupport | undefined {
  const value = findValue(record, voteIntentKey(proposalId, accountIdToHex(voter)));
  const support = value === undefined ? undefined : parseCount(value);
  return isVoteSupport(support) ? support : undefined;
}
