/**
 * Test helpers for @civitas/governance.
 *
 * Accounts are 20 zero bytes with the first and last byte set to a seed,
 * so their hex form is easy to read in assertions.
 */

import type { AccountId, Result } from "@civitas/types";
import { setMember } from "../src/membership.js";

export function account(seed: number): AccountId {
  const id = new Uint8Array(20);
  id[0] = seed;
  id[19] = seed;
  return id;
}

export function hexOf(seed: number): string {
  const byte = seed.toString(16).padStart(2, "0");
  return `${byte}${"00".repeat(18)}${byte}`;
}

export const ALICE = account(0xaa);
export const BOB = account(0xbb);
export const CAROL = account(0xcc);
export const DAVE = account(0xdd);
export const EVE = account(0xee);

/** Value of a successful result; fails the test otherwise. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

/** Error code of a failed result; fails the test otherwise. */
export function errorCode<T>(result: Result<T>): string {
  if (result.ok) {
    throw new Error("Expected failure, got success");
  }
  return result.error.code;
}

/** A record holding the given members, in order. */
export function withMembers(
  members: readonly { account: AccountId; power: bigint; roles?: number }[],
  record = "",
): string {
  let current = record;
  for (const m of members) {
    current = unwrap(setMember(current, m.account, m.power, m.roles ?? 0));
  }
  return current;
}
