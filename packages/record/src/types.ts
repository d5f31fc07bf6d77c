/**
 * @civitas/record — Record format constants.
 *
 * A ledger record is a sequence of `key=value` entries joined by `;`.
 *
 * Rules:
 * - Keys and values are printable ASCII
 * - Neither may contain the entry separator or the key/value separator
 * - The encoded record never exceeds its capacity
 */

/** Default record capacity in bytes. */
export const RECORD_CAPACITY = 4096;

export const ENTRY_SEPARATOR = ";";

export const KEY_VALUE_SEPARATOR = "=";

/** Largest index a composite key can carry. */
export const MAX_KEY_INDEX = 255;
