export { combine, HASH_MIX_CONSTANT, EMPTY_DIGEST, type Digest } from "./combine.js";

export { HashError, type HashErrorCode } from "./errors.js";

export {
  standardHash,
  isStandardValue,
  hashNumber,
  hashString,
  hashBigInt,
  type StandardValue,
} from "./standard.js";

export { enumMembers, type EnumLike, type EnumMember } from "./enums.js";

export { hashMethod, type HashableType } from "./custom.js";

export { Tuple, tuple, type Hashable, type HashableObject } from "./composite.js";

export {
  HashDispatcher,
  createDispatcher,
  DispatcherOptionsSchema,
  type DispatcherOptions,
  type StrategyKind,
} from "./dispatch.js";

export { hashOf, combinedHash, resolveStrategy } from "./entry.js";
