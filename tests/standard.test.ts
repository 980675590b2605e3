import { describe, it, expect } from "vitest";
import {
  hashBigInt,
  hashNumber,
  hashString,
  isStandardValue,
  standardHash,
} from "../src/hash/standard.js";

// ===================================================================
// numbers
// ===================================================================

describe("hashNumber", () => {
  it("hashes small non-negative integers to themselves", () => {
    expect(hashNumber(0)).toBe(0);
    expect(hashNumber(1)).toBe(1);
    expect(hashNumber(2)).toBe(2);
    expect(hashNumber(0xffffffff)).toBe(0xffffffff);
  });

  it("folds the high word of wide integers", () => {
    expect(hashNumber(2 ** 32)).toBe(1);
    expect(hashNumber(2 ** 32 + 3)).toBe(2);
  });

  it("hashes -0 like 0", () => {
    expect(hashNumber(-0)).toBe(hashNumber(0));
  });

  it("complements the digest of negative integers", () => {
    // ~1, ~2
    expect(hashNumber(-1)).toBe(0xfffffffe);
    expect(hashNumber(-2)).toBe(0xfffffffd);
    // magnitude 2^32 folds to 1
    expect(hashNumber(-(2 ** 32))).toBe(0xfffffffe);
  });

  it("hashes -n apart from n - 1", () => {
    for (const n of [1, 2, 3, 100, 65536]) {
      expect(hashNumber(-n)).not.toBe(hashNumber(n - 1));
    }
    expect(hashNumber(-1)).not.toBe(hashNumber(1));
  });

  it("hashes fractions by their IEEE-754 bits", () => {
    // 1.5 = 0x3ff80000_00000000
    expect(hashNumber(1.5)).toBe(0x3ff80000);
    expect(hashNumber(0.1)).toBe(2787115011);
  });

  it("canonicalizes NaN", () => {
    expect(hashNumber(NaN)).toBe(0x7ff80000);
    expect(hashNumber(0 / 0)).toBe(hashNumber(NaN));
  });

  it("hashes infinities apart", () => {
    expect(hashNumber(Infinity)).toBe(0x7ff00000);
    expect(hashNumber(-Infinity)).toBe(0xfff00000);
  });
});

// ===================================================================
// strings
// ===================================================================

describe("hashString", () => {
  it("returns the FNV-1a offset basis for the empty string", () => {
    expect(hashString("")).toBe(0x811c9dc5);
  });

  it("matches FNV-1a for short ASCII input", () => {
    expect(hashString("a")).toBe(3826002220);
    expect(hashString("ab")).toBe(1294271946);
  });

  it("distinguishes anagrams", () => {
    expect(hashString("ab")).not.toBe(hashString("ba"));
  });
});

// ===================================================================
// bigints
// ===================================================================

describe("hashBigInt", () => {
  it("folds a single word for small values", () => {
    expect(hashBigInt(0n)).toBe(2654435769);
    expect(hashBigInt(1n)).toBe(2654435770);
  });

  it("folds every 32-bit word of wide values", () => {
    expect(hashBigInt(2n ** 32n)).toBe(3449077713);
  });

  it("complements the digest of negative values", () => {
    expect(hashBigInt(-1n)).toBe(1640531525);
    expect(hashBigInt(-1n)).not.toBe(hashBigInt(1n));
  });
});

// ===================================================================
// standardHash
// ===================================================================

describe("standardHash", () => {
  it("hashes booleans to 1 and 0", () => {
    expect(standardHash(true)).toBe(1);
    expect(standardHash(false)).toBe(0);
  });

  it("hashes null to 0", () => {
    expect(standardHash(null)).toBe(0);
  });

  it("hashes a Date by its time value", () => {
    expect(standardHash(new Date(1000))).toBe(1000);
    expect(standardHash(new Date("2024-01-01T00:00:00.000Z"))).toBe(
      hashNumber(Date.UTC(2024, 0, 1)),
    );
  });

  it("dispatches each primitive to its hash", () => {
    expect(standardHash(7)).toBe(hashNumber(7));
    expect(standardHash("key")).toBe(hashString("key"));
    expect(standardHash(9n)).toBe(hashBigInt(9n));
  });
});

describe("isStandardValue", () => {
  it("accepts the built-in value types", () => {
    for (const value of [0, 1.5, 1n, "", true, null, new Date(0)]) {
      expect(isStandardValue(value)).toBe(true);
    }
  });

  it("rejects everything else", () => {
    for (const value of [undefined, Symbol("s"), () => 0, {}, [], new Map()]) {
      expect(isStandardValue(value)).toBe(false);
    }
  });
});
