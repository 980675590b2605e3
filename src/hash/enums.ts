/**
 * Enumerated types.
 *
 * A TypeScript numeric enum compiles to an object carrying both the
 * name -> value entries and value -> name reverse mappings:
 *
 *   enum Color { Red, Green }  =>  { Red: 0, Green: 1, "0": "Red", "1": "Green" }
 *
 * Only the forward entries are members. String enums have no reverse
 * mappings.
 */

export type EnumLike = {
  readonly [name: string]: string | number;
  readonly [value: number]: string;
};

export type EnumMember = string | number;

/** The member values of an enum object, in declaration order. */
export function enumMembers(enumObject: Readonly<Record<string, EnumMember>>): EnumMember[] {
  const members: EnumMember[] = [];
  for (const [name, value] of Object.entries(enumObject)) {
    // Reverse mapping: "0" -> "Red" where enumObject.Red === 0.
    if (typeof value === "string") {
      const forward = enumObject[value];
      if (typeof forward === "number" && String(forward) === name) continue;
    }
    members.push(value);
  }
  return members;
}
