/**
 * Module-level entry points, backed by a dispatcher with no registered enums.
 */

import type { Digest } from "./combine.js";
import type { Hashable } from "./composite.js";
import { HashDispatcher, type StrategyKind } from "./dispatch.js";

const defaultDispatcher = new HashDispatcher();

export function hashOf(value: Hashable): Digest {
  return defaultDispatcher.hashOf(value);
}

/**
 * Hash several values in one call, e.g. the fields of a custom type:
 *
 *   static [hashMethod](p: Point): Digest {
 *     return combinedHash(p.x, p.y);
 *   }
 */
export function combinedHash(...values: readonly Hashable[]): Digest {
  return defaultDispatcher.combinedHash(...values);
}

export function resolveStrategy(value: Hashable): StrategyKind {
  return defaultDispatcher.resolveStrategy(value);
}
