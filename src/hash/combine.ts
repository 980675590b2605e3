/**
 * The mixing primitive.
 *
 * Digests are unsigned 32-bit integers carried in a `number`. All arithmetic
 * is reduced with `>>> 0` so results stay in [0, 2^32).
 */

/** Unsigned 32-bit digest. */
export type Digest = number;

/** Golden-ratio constant: 2^32 / phi, odd. */
export const HASH_MIX_CONSTANT = 0x9e3779b9;

/** The neutral digest: empty sequences and empty tuples hash to this. */
export const EMPTY_DIGEST: Digest = 0;

/**
 * Fold `value` into `seed`.
 *
 *   seed ^ (value + K + (seed << 6) + (seed >>> 2))
 *
 * Order-sensitive: combine(combine(s, a), b) !== combine(combine(s, b), a)
 * for typical a !== b.
 */
export function combine(seed: Digest, value: Digest): Digest {
  const mixed = (value + HASH_MIX_CONSTANT + (seed << 6) + (seed >>> 2)) >>> 0;
  return (seed ^ mixed) >>> 0;
}

/** True when `value` is an integer that can be reduced to a digest. */
export function isDigestLike(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

/** Reduce an integer to its low 32 bits, unsigned. */
export function toDigest(value: number): Digest {
  return value >>> 0;
}
