/**
 * @civitas/governance — Identifier hash.
 *
 * FNV-1a accumulation over the bound fields followed by the MurmurHash3
 * 64-bit finalizer. Ids are the low 32 bits with bit 0 forced on, so an
 * id is never zero.
 *
 * Not cryptographically secure. Collisions are unlikely for distinct
 * inputs but nothing here resists a chosen-input attacker.
 */

import { ACCOUNT_ID_SIZE } from "@civitas/types";
import type { AccountId } from "@civitas/types";
import { MAX_U8, isU32 } from "@civitas/record";

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const FMIX_C1 = 0xff51afd7ed558ccdn;
const FMIX_C2 = 0xc4ceb9fe1a85ec53n;
const GOLDEN_RATIO_32 = 0x9e3779b9;

// ─── Primitives ──────────────────────────────────────────────────────────

function u32BigEndian(value: number): Uint8Array {
  if (!isU32(value)) {
    throw new RangeError(`Not a u32: ${String(value)}`);
  }
  return new Uint8Array([
    (value >>> 24) & 0xff,
    (value >>> 16) & 0xff,
    (value >>> 8) & 0xff,
    value & 0xff,
  ]);
}

function u8(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > MAX_U8) {
    throw new RangeError(`Not a u8: ${String(value)}`);
  }
  return new Uint8Array([value]);
}

/** MurmurHash3 fmix64. */
export function fmix64(input: bigint): bigint {
  let h = BigInt.asUintN(64, input);
  h ^= h >> 33n;
  h = BigInt.asUintN(64, h * FMIX_C1);
  h ^= h >> 33n;
  h = BigInt.asUintN(64, h * FMIX_C2);
  h ^= h >> 33n;
  return h;
}

/** FNV-1a over each field in order, then {@link fmix64}. */
export function digest64(fields: readonly Uint8Array[]): bigint {
  let h = FNV_OFFSET_BASIS;
  for (const field of fields) {
    for (const byte of field) {
      h ^= BigInt(byte);
      h = BigInt.asUintN(64, h * FNV_PRIME);
    }
  }
  return fmix64(h);
}

function toId(digest: bigint): number {
  return Number(BigInt.asUintN(32, digest) | 1n);
}

// ─── Identifiers ─────────────────────────────────────────────────────────

export function hashProposal(
  proposer: AccountId,
  descriptionHash: number,
  now: number,
  nonce: number,
): number {
  if (proposer.length !== ACCOUNT_ID_SIZE) {
    throw new RangeError(`Proposer must be ${String(ACCOUNT_ID_SIZE)} bytes`);
  }
  return toId(digest64([proposer, u32BigEndian(descriptionHash), u32BigEndian(now), u8(nonce)]));
}

export function hashOperation(proposalId: number, scheduleTime: number, nonce: number): number {
  return toId(digest64([u32BigEndian(proposalId), u32BigEndian(scheduleTime), u8(nonce)]));
}

/**
 * Description hash used when the caller supplies none: the ledger time
 * multiplied by 0x9E3779B9, wrapping at 32 bits.
 */
export function descriptionHashFromTime(now: number): number {
  return Math.imul(now, GOLDEN_RATIO_32) >>> 0;
}
