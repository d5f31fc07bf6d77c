/**
 * @civitas/record — Hex codec for account identifiers.
 *
 * Accounts are stored in the record as 40 lowercase hex characters.
 */

import { ACCOUNT_ID_SIZE, isAccountId } from "@civitas/types";
import type { AccountId } from "@civitas/types";

const HEX_DIGITS = "0123456789abcdef";

export function encodeHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += HEX_DIGITS.charAt(b >> 4) + HEX_DIGITS.charAt(b & 0x0f);
  }
  return out;
}

/** Decode hex of either case. Undefined on odd length or a non-hex digit. */
export function decodeHex(text: string): Uint8Array | undefined {
  if (text.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(text)) {
    return undefined;
  }
  const bytes = new Uint8Array(text.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(text.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function accountIdToHex(account: AccountId): string {
  if (!isAccountId(account)) {
    throw new RangeError(`Account id must be ${String(ACCOUNT_ID_SIZE)} bytes`);
  }
  return encodeHex(account);
}

export function accountIdFromHex(text: string): AccountId | undefined {
  if (text.length !== ACCOUNT_ID_SIZE * 2) return undefined;
  return decodeHex(text);
}
