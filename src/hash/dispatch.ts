/**
 * Strategy dispatch.
 *
 * Every value resolves to exactly one strategy, tried in this order:
 *
 *   1. custom    — the value's constructor defines a static `hashMethod`.
 *                  Tuples and arrays are registered here too, as the
 *                  built-in `tuple` and `sequence` rules, below user methods.
 *   2. enum      — the value equals a member of an enum given to the
 *                  dispatcher; its underlying value is hashed with the
 *                  standard strategy. Enum members are plain numbers and
 *                  strings at run time, so membership is by value: with
 *                  `{ Debug: 10 }` registered, a plain 10 resolves here too.
 *                  The digest is the same either way.
 *   3. standard  — number, bigint, string, boolean, null, Date.
 *
 * A value matching none of them throws UNHASHABLE_TYPE. There is no fallback
 * digest.
 */

import { z } from "zod";
import type { Digest } from "./combine.js";
import { Tuple, foldSequence, foldTuple, tuple, type Hashable } from "./composite.js";
import { findCustomHash, type CustomHash } from "./custom.js";
import { enumMembers, type EnumLike, type EnumMember } from "./enums.js";
import { HashError, describeType } from "./errors.js";
import { isStandardValue, standardHash, type StandardValue } from "./standard.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

const EnumObjectSchema = z.record(z.string(), z.union([z.string(), z.number()]));

export const DispatcherOptionsSchema = z
  .object({
    enums: z.array(EnumObjectSchema).default([]),
  })
  .strict();

export interface DispatcherOptions {
  /**
   * Enum objects whose member values resolve to the enum strategy. Matching
   * is by value: any equal number or string resolves to `enum`.
   */
  enums?: readonly EnumLike[];
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export type StrategyKind = "custom" | "tuple" | "sequence" | "enum" | "standard";

type Resolution =
  | { kind: "custom"; value: object; hash: CustomHash }
  | { kind: "tuple"; value: Tuple }
  | { kind: "sequence"; value: readonly unknown[] }
  | { kind: "enum"; value: EnumMember }
  | { kind: "standard"; value: StandardValue };

export class HashDispatcher {
  private readonly enumValues: ReadonlySet<EnumMember>;

  constructor(options: DispatcherOptions = {}) {
    const parsed = DispatcherOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new HashError(
        `Invalid dispatcher options: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
        "INVALID_OPTIONS",
        { issues: parsed.error.issues },
      );
    }
    this.enumValues = new Set(parsed.data.enums.flatMap((e) => enumMembers(e)));
  }

  /** Digest of any hashable value: scalar, tuple, or sequence. */
  hashOf(value: Hashable): Digest {
    return this.hashAt(value, "");
  }

  /** Hash several values as one tuple, in argument order. */
  combinedHash(...values: readonly Hashable[]): Digest {
    return this.hashOf(tuple(...values));
  }

  /**
   * The strategy `hashOf` would use for `value`. Numbers and strings equal
   * to a registered enum member report `enum`, whatever their origin.
   */
  resolveStrategy(value: Hashable): StrategyKind {
    return this.resolve(value, "").kind;
  }

  private hashAt(value: unknown, path: string): Digest {
    const resolution = this.resolve(value, path);
    switch (resolution.kind) {
      case "custom":
        return resolution.hash(resolution.value);
      case "tuple":
        return foldTuple(resolution.value.items, (item, i) =>
          this.hashAt(item, `${path}[${i}]`),
        );
      case "sequence":
        return foldSequence(resolution.value, (item, i) =>
          this.hashAt(item, `${path}[${i}]`),
        );
      case "enum":
      case "standard":
        return standardHash(resolution.value);
    }
  }

  private resolve(value: unknown, path: string): Resolution {
    if (typeof value === "object" && value !== null) {
      const hash = findCustomHash(value);
      if (hash !== undefined) return { kind: "custom", value, hash };
      if (value instanceof Tuple) return { kind: "tuple", value };
      if (Array.isArray(value)) return { kind: "sequence", value };
    }
    if ((typeof value === "string" || typeof value === "number") && this.enumValues.has(value)) {
      return { kind: "enum", value };
    }
    if (isStandardValue(value)) return { kind: "standard", value };

    const type = describeType(value);
    throw new HashError(
      path === "" ? `Unhashable type: ${type}` : `Unhashable type at ${path}: ${type}`,
      "UNHASHABLE_TYPE",
      { type, path },
    );
  }
}

export function createDispatcher(options: DispatcherOptions = {}): HashDispatcher {
  return new HashDispatcher(options);
}
