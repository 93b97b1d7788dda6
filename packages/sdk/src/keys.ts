/**
 * Key kinds: match types, runtime dispatch and key value equality
 */

import { Identifier } from "./identifier.js";
import type { KeyDeclaration, KeyLookup, TaggedLookup } from "./types.js";

export const MATCH_TYPES = ["string", "number", "bigint", "boolean", "date", "identifier"] as const;

export type MatchType = (typeof MATCH_TYPES)[number];

/**
 * Match type exempt from both the one-declaration-per-type rule and the
 * uniqueness check
 */
export const IDENTIFIER_MATCH_TYPE = "identifier" satisfies MatchType;

/**
 * A key declaration with its extractor bound to the record type
 */
export interface CompiledKey<T> {
  readonly projectionName: string;
  readonly matchType: MatchType;
  readonly unique: boolean;
  extract(record: T): unknown;
}

/**
 * Bind each declaration to an extractor, keeping schema order
 */
export function compileKeys<T>(declarations: readonly KeyDeclaration<T>[]): CompiledKey<T>[] {
  return declarations.map((declaration) => {
    const attribute = declaration.sourceAttribute;
    return {
      projectionName: declaration.projectionName,
      matchType: declaration.matchType,
      unique: declaration.matchType !== IDENTIFIER_MATCH_TYPE,
      extract: (record: T) => record[attribute],
    };
  });
}

/**
 * Match type of a runtime value, or undefined if no key kind carries it
 */
export function matchTypeOf(value: unknown): MatchType | undefined {
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "bigint":
      return "bigint";
    case "boolean":
      return "boolean";
    case "object":
      if (value instanceof Identifier) return "identifier";
      if (value instanceof Date) return "date";
      return undefined;
    default:
      return undefined;
  }
}

/**
 * Key value equality: identifiers by value, dates by timestamp, NaN equals NaN
 * (for numbers and invalid dates alike), everything else strictly
 */
export function keyEquals(a: unknown, b: unknown): boolean {
  if (a instanceof Identifier && b instanceof Identifier) {
    return a.equals(b);
  }
  if (a instanceof Date && b instanceof Date) {
    return Object.is(a.getTime(), b.getTime());
  }
  if (typeof a === "number" && typeof b === "number" && Number.isNaN(a) && Number.isNaN(b)) {
    return true;
  }
  return a === b;
}

export function isTaggedLookup(lookup: KeyLookup): lookup is TaggedLookup {
  return (
    typeof lookup === "object" &&
    !(lookup instanceof Identifier) &&
    !(lookup instanceof Date) &&
    "key" in lookup
  );
}
