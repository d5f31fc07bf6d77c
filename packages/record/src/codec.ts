/**
 * @civitas/record — Ledger record codec.
 *
 * Every component reads and rewrites the record through this module.
 * Lookups are linear scans; every mutation rebuilds the whole record,
 * rewriting matched entries at their scan position and copying the rest.
 *
 * Rules:
 * - Empty entries are dropped when a record is rebuilt
 * - Entries without `=` are copied verbatim and never match a key
 * - Encoding fails closed with RECORD_FULL, never truncates
 */

import { Buffer } from "node:buffer";
import { fail, ok } from "@civitas/types";
import type { Result } from "@civitas/types";
import {
  ENTRY_SEPARATOR,
  KEY_VALUE_SEPARATOR,
  RECORD_CAPACITY,
} from "./types.js";

// ─── Entry Text ──────────────────────────────────────────────────────────

/** Printable ASCII except `;` and `=`. */
const ENTRY_TEXT = /^[\x20-\x3a\x3c\x3e-\x7e]*$/;

function assertKey(key: string): void {
  if (key.length === 0 || !ENTRY_TEXT.test(key)) {
    throw new RangeError(`Invalid record key: "${key}"`);
  }
}

function assertValue(key: string, value: string): void {
  if (!ENTRY_TEXT.test(value)) {
    throw new RangeError(`Invalid value for record key "${key}": "${value}"`);
  }
}

function splitEntries(record: string): string[] {
  if (record === "") return [];
  return record.split(ENTRY_SEPARATOR).filter((entry) => entry !== "");
}

/** Key of a raw entry, or undefined when the entry has no `=`. */
function entryKey(entry: string): string | undefined {
  const eq = entry.indexOf(KEY_VALUE_SEPARATOR);
  return eq === -1 ? undefined : entry.slice(0, eq);
}

function entryValue(entry: string): string {
  return entry.slice(entry.indexOf(KEY_VALUE_SEPARATOR) + 1);
}

export function byteLength(record: string): number {
  return Buffer.byteLength(record, "utf8");
}

// ─── Draft ───────────────────────────────────────────────────────────────

/**
 * A working copy of a record.
 *
 * Components apply several edits to a draft and encode it once, so a
 * failed capacity check leaves nothing half-written.
 */
export class RecordDraft {
  private readonly _entries: string[];

  constructor(record: string = "") {
    this._entries = splitEntries(record);
  }

  get(key: string): string | undefined {
    for (const entry of this._entries) {
      if (entryKey(entry) === key) {
        return entryValue(entry);
      }
    }
    return undefined;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Rewrite every entry with this key in place.
   * Returns false, changing nothing, when the key is absent.
   */
  replace(key: string, value: string): boolean {
    assertKey(key);
    assertValue(key, value);
    let found = false;
    for (let i = 0; i < this._entries.length; i++) {
      const entry = this._entries[i];
      if (entry !== undefined && entryKey(entry) === key) {
        this._entries[i] = `${key}${KEY_VALUE_SEPARATOR}${value}`;
        found = true;
      }
    }
    return found;
  }

  /** Rewrite in place when present, append otherwise. */
  set(key: string, value: string): this {
    if (!this.replace(key, value)) {
      this.append(key, value);
    }
    return this;
  }

  append(key: string, value: string): this {
    assertKey(key);
    assertValue(key, value);
    this._entries.push(`${key}${KEY_VALUE_SEPARATOR}${value}`);
    return this;
  }

  /** Drop every entry with this key. */
  remove(key: string): this {
    for (let i = this._entries.length - 1; i >= 0; i--) {
      const entry = this._entries[i];
      if (entry !== undefined && entryKey(entry) === key) {
        this._entries.splice(i, 1);
      }
    }
    return this;
  }

  /** Keys in scan order; entries without `=` are skipped. */
  keys(): string[] {
    const keys: string[] = [];
    for (const entry of this._entries) {
      const key = entryKey(entry);
      if (key !== undefined) keys.push(key);
    }
    return keys;
  }

  toString(): string {
    return this._entries.join(ENTRY_SEPARATOR);
  }

  encode(capacity: number = RECORD_CAPACITY): Result<string> {
    const text = this.toString();
    const size = byteLength(text);
    if (size > capacity) {
      return fail(
        "RECORD_FULL",
        `Record needs ${String(size)} bytes, capacity is ${String(capacity)}`,
      );
    }
    return ok(text);
  }
}

// ─── Functional API ──────────────────────────────────────────────────────

/** First value stored under `key`, or undefined. */
export function findValue(record: string, key: string): string | undefined {
  let pos = 0;
  while (pos < record.length) {
    let end = record.indexOf(ENTRY_SEPARATOR, pos);
    if (end === -1) end = record.length;
    const entry = record.slice(pos, end);
    if (entryKey(entry) === key) {
      return entryValue(entry);
    }
    pos = end + 1;
  }
  return undefined;
}

export function hasKey(record: string, key: string): boolean {
  return findValue(record, key) !== undefined;
}

/** Replace the entry in place when present, append otherwise. */
export function rewriteEntry(
  record: string,
  key: string,
  value: string,
  capacity: number = RECORD_CAPACITY,
): Result<string> {
  return new RecordDraft(record).set(key, value).encode(capacity);
}

export function appendEntry(
  record: string,
  key: string,
  value: string,
  capacity: number = RECORD_CAPACITY,
): Result<string> {
  return new RecordDraft(record).append(key, value).encode(capacity);
}

/** Separator to place before a new entry; nothing before the first. */
export function appendSeparator(record: string): string {
  return record === "" ? record : `${record}${ENTRY_SEPARATOR}`;
}

export function removeEntry(record: string, key: string): string {
  return new RecordDraft(record).remove(key).toString();
}
