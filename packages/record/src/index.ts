/**
 * @civitas/record — Flat key=value ledger record codec.
 *
 * Encodes and decodes the single text record that holds all governance
 * state, plus the integer and hex conversions its values use.
 */

export {
  RECORD_CAPACITY,
  ENTRY_SEPARATOR,
  KEY_VALUE_SEPARATOR,
  MAX_KEY_INDEX,
} from "./types.js";

export {
  RecordDraft,
  findValue,
  hasKey,
  rewriteEntry,
  appendEntry,
  appendSeparator,
  removeEntry,
  byteLength,
} from "./codec.js";

export { indexedKey, parseIndexedKey } from "./keys.js";

export {
  MAX_U8,
  MAX_U32,
  MAX_U64,
  isU32,
  isU64,
  formatU32,
  formatU64,
  parseU32,
  parseU64,
  parseCount,
  checkedAddU64,
  saturatingAddU64,
  saturatingMulU64,
  checkedAddU32,
  saturatingAddU32,
} from "./numeric.js";

export {
  encodeHex,
  decodeHex,
  accountIdToHex,
  accountIdFromHex,
} from "./hex.js";
