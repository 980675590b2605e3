/**
 * Standard strategy: digests for the built-in value types.
 *
 *   integer  -> magnitude's low 32 bits ^ high 32 bits, complemented if negative
 *               (small non-negative ints hash to themselves)
 *   float    -> IEEE-754 bits, both halves XORed, NaN canonicalized
 *   string   -> FNV-1a (32-bit) over UTF-16 code units
 *   boolean  -> 1 / 0
 *   null     -> 0
 *   bigint   -> 32-bit magnitude words folded with combine(), complemented if negative
 *   Date     -> its time value, hashed as a number
 *
 * Pure functions — no I/O, no side effects.
 */

import { combine, type Digest } from "./combine.js";

export type StandardValue = number | bigint | string | boolean | null | Date;

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

const TWO_POW_32 = 0x1_0000_0000;

// Shared scratch space for reading float bits. Written and read within one
// synchronous call.
const floatView = new DataView(new ArrayBuffer(8));

export function hashNumber(value: number): Digest {
  if (Number.isSafeInteger(value)) {
    const magnitude = Math.abs(value);
    const low = magnitude >>> 0;
    const high = Math.floor(magnitude / TWO_POW_32) >>> 0;
    const hash = (low ^ high) >>> 0;
    return value < 0 ? ~hash >>> 0 : hash;
  }
  floatView.setFloat64(0, Number.isNaN(value) ? NaN : value);
  return (floatView.getUint32(0) ^ floatView.getUint32(4)) >>> 0;
}

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function hashString(value: string): Digest {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

// ---------------------------------------------------------------------------
// BigInts
// ---------------------------------------------------------------------------

export function hashBigInt(value: bigint): Digest {
  const negative = value < 0n;
  let rest = negative ? -value : value;
  let hash: Digest = 0;
  do {
    hash = combine(hash, Number(BigInt.asUintN(32, rest)));
    rest >>= 32n;
  } while (rest > 0n);
  return negative ? ~hash >>> 0 : hash;
}

// ---------------------------------------------------------------------------
// Dispatch over standard types
// ---------------------------------------------------------------------------

export function isStandardValue(value: unknown): value is StandardValue {
  switch (typeof value) {
    case "number":
    case "bigint":
    case "string":
    case "boolean":
      return true;
    case "object":
      return value === null || value instanceof Date;
    default:
      return false;
  }
}

/** Digest of a value handled by the standard strategy. */
export function standardHash(value: StandardValue): Digest {
  if (value === null) return 0;
  if (value instanceof Date) return hashNumber(value.getTime());
  if (typeof value === "number") return hashNumber(value);
  if (typeof value === "bigint") return hashBigInt(value);
  if (typeof value === "string") return hashString(value);
  return value ? 1 : 0;
}
