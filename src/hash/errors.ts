/**
 * Hashing error types.
 *
 * One class, fixed codes.
 */

export type HashErrorCode =
  | "UNHASHABLE_TYPE"
  | "INVALID_DIGEST"
  | "INVALID_OPTIONS";

export class HashError extends Error {
  public readonly code: HashErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: HashErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "HashError";
    this.code = code;
    this.details = details ?? {};
  }
}

/**
 * Short, human-readable description of a value's runtime type, used in
 * error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === "function" && ctor.name !== "") {
      return ctor.name;
    }
    return "object";
  }
  return typeof value;
}
