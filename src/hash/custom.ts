/**
 * Custom strategy: types that hash themselves.
 *
 * A class opts in by defining a static method under `hashMethod`:
 *
 *   class ResourceRef {
 *     constructor(readonly kind: string, readonly id: number, readonly label: string) {}
 *
 *     static [hashMethod](ref: ResourceRef): Digest {
 *       return combinedHash(ref.kind, ref.id); // label is not part of identity
 *     }
 *   }
 *
 * The method is looked up on the value's constructor, so subclasses inherit
 * it unless they define their own.
 */

import { isDigestLike, toDigest, type Digest } from "./combine.js";
import { HashError, describeType } from "./errors.js";

export const hashMethod: unique symbol = Symbol.for("keyhash.hashMethod");

/** The static side of a class that hashes its own instances. */
export interface HashableType<T> {
  [hashMethod](value: T): Digest;
}

export type CustomHash = (value: object) => Digest;

/**
 * The custom hash defined for `value`'s type, or undefined when its
 * constructor defines none.
 */
export function findCustomHash(value: object): CustomHash | undefined {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  if (typeof ctor !== "function") return undefined;
  const method: unknown = Reflect.get(ctor, hashMethod);
  if (typeof method !== "function") return undefined;

  return (target: object): Digest => {
    const result: unknown = method.call(ctor, target);
    if (!isDigestLike(result)) {
      throw new HashError(
        `Custom hash of ${describeType(target)} returned ${describeType(result)}, expected an integer`,
        "INVALID_DIGEST",
        { type: describeType(target), result: String(result) },
      );
    }
    return toDigest(result);
  };
}
