/**
 * Composite rules: fixed-arity tuples and ordered sequences.
 *
 * Tuple traversal order is lowest index innermost:
 *
 *   hash(tuple(a, b, c)) = combine(h(c), combine(h(b), h(a)))
 *
 * Sequences fold left from the neutral digest:
 *
 *   hash([a, b, c]) = combine(combine(combine(0, h(a)), h(b)), h(c))
 *
 * Both are iterative. Holes in sparse arrays are visited as undefined.
 */

import { combine, EMPTY_DIGEST, type Digest } from "./combine.js";
import type { StandardValue } from "./standard.js";

/**
 * Objects that may carry a custom hash method. Functions and non-array
 * iterables (Map, Set, generators) are rejected at compile time; whether the
 * object's type defines a hash method is checked on first use.
 */
export type HashableObject = object & {
  readonly call?: never;
  readonly [Symbol.iterator]?: never;
};

/** Anything `hashOf` accepts at compile time. Array elements are checked recursively. */
export type Hashable =
  | StandardValue
  | readonly Hashable[]
  | Tuple<readonly Hashable[]>
  | HashableObject;

/**
 * Immutable fixed-arity group of values. Arrays hash as sequences; wrap
 * values in a Tuple to select the tuple rule instead.
 *
 * Built only through `tuple()` / `Tuple.of()`, whose rest parameter is a
 * fresh array owned by the tuple.
 */
export class Tuple<T extends readonly Hashable[] = readonly Hashable[]> {
  public readonly items: T;

  private constructor(items: T) {
    Object.freeze(items);
    this.items = items;
    Object.freeze(this);
  }

  static of<T extends readonly Hashable[]>(...items: T): Tuple<T> {
    return new Tuple(items);
  }

  get length(): number {
    return this.items.length;
  }
}

export function tuple<T extends readonly Hashable[]>(...items: T): Tuple<T> {
  return Tuple.of(...items);
}

export type ElementHash<T> = (item: T, index: number) => Digest;

/** Tuple rule. An empty tuple hashes to the neutral digest. */
export function foldTuple<T>(items: readonly T[], hashItem: ElementHash<T>): Digest {
  if (items.length === 0) return EMPTY_DIGEST;
  let hash = hashItem(items[0], 0);
  for (let i = 1; i < items.length; i++) {
    hash = combine(hashItem(items[i], i), hash);
  }
  return hash;
}

/** Sequence rule. An empty sequence hashes to the neutral digest. */
export function foldSequence<T>(items: readonly T[], hashItem: ElementHash<T>): Digest {
  let hash = EMPTY_DIGEST;
  for (let i = 0; i < items.length; i++) {
    hash = combine(hash, hashItem(items[i], i));
  }
  return hash;
}
