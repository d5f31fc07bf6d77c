/**
 * @civitas/record — Composite keys.
 *
 * A composite key is `<prefix><index><suffix>`, where index is 0–255
 * written in decimal without leading zeros: `prop_12_state`, `member_3`.
 */

import { MAX_KEY_INDEX } from "./types.js";

function assertIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index > MAX_KEY_INDEX) {
    throw new RangeError(`Key index out of range 0-${String(MAX_KEY_INDEX)}: ${String(index)}`);
  }
}

export function indexedKey(prefix: string, index: number, suffix: string = ""): string {
  assertIndex(index);
  return `${prefix}${String(index)}${suffix}`;
}

/**
 * Inverse of {@link indexedKey}. Returns undefined unless the key is
 * exactly what `indexedKey(prefix, n, suffix)` produces for some n.
 */
export function parseIndexedKey(
  key: string,
  prefix: string,
  suffix: string = "",
): number | undefined {
  if (!key.startsWith(prefix) || !key.endsWith(suffix)) return undefined;
  if (key.length < prefix.length + suffix.length + 1) return undefined;

  const digits = key.slice(prefix.length, key.length - suffix.length);
  if (!/^(0|[1-9]\d{0,2})$/.test(digits)) return undefined;

  const index = Number(digits);
  return index <= MAX_KEY_INDEX ? index : undefined;
}
