/**
 * @civitas/record — Unsigned integer text codec and fixed-width arithmetic.
 *
 * 32-bit values are numbers, 64-bit values are bigints.
 *
 * Rules:
 * - No floating-point arithmetic on 64-bit values
 * - Parsing never throws; malformed or out-of-range text is undefined
 * - Formatting throws RangeError for values outside the type
 */

export const MAX_U8 = 0xff;
export const MAX_U32 = 0xffff_ffff;
export const MAX_U64 = 0xffff_ffff_ffff_ffffn;

// ─── Guards ──────────────────────────────────────────────────────────────

export function isU32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_U32;
}

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= MAX_U64;
}

// ─── Formatting ──────────────────────────────────────────────────────────

export function formatU32(value: number): string {
  if (!isU32(value)) {
    throw new RangeError(`Not a u32: ${String(value)}`);
  }
  return value.toString(10);
}

export function formatU64(value: bigint): string {
  if (!isU64(value)) {
    throw new RangeError(`Not a u64: ${value.toString()}`);
  }
  return value.toString(10);
}

// ─── Parsing ─────────────────────────────────────────────────────────────

export function parseU32(text: string): number | undefined {
  if (!/^\d{1,10}$/.test(text)) return undefined;
  const value = Number(text);
  return value <= MAX_U32 ? value : undefined;
}

export function parseU64(text: string): bigint | undefined {
  if (!/^\d{1,20}$/.test(text)) return undefined;
  const value = BigInt(text);
  return value <= MAX_U64 ? value : undefined;
}

/** Parse a 0–255 counter such as `proposal_count`. */
export function parseCount(text: string): number | undefined {
  const value = parseU32(text);
  return value !== undefined && value <= MAX_U8 ? value : undefined;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/** Sum, or undefined on overflow. */
export function checkedAddU64(a: bigint, b: bigint): bigint | undefined {
  const sum = a + b;
  return sum <= MAX_U64 ? sum : undefined;
}

export function saturatingAddU64(a: bigint, b: bigint): bigint {
  const sum = a + b;
  return sum <= MAX_U64 ? sum : MAX_U64;
}

export function saturatingMulU64(a: bigint, b: bigint): bigint {
  const product = a * b;
  return product <= MAX_U64 ? product : MAX_U64;
}

export function checkedAddU32(a: number, b: number): number | undefined {
  const sum = a + b;
  return sum <= MAX_U32 ? sum : undefined;
}

export function saturatingAddU32(a: number, b: number): number {
  return Math.min(a + b, MAX_U32);
}
