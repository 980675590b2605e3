import type { Digest } from "../src/hash/combine.js";
import { hashOf } from "../src/hash/entry.js";
import { HashError } from "../src/hash/errors.js";

/** Run `fn` and return the HashError it throws; fail if it throws nothing. */
export function catchHashError(fn: () => unknown): HashError {
  try {
    fn();
  } catch (e) {
    if (e instanceof HashError) return e;
    throw e;
  }
  throw new Error("expected a HashError");
}

/** Call hashOf on a value the type checker would reject. */
export function hashUnchecked(value: unknown): Digest {
  return Reflect.apply(hashOf, undefined, [value]);
}
