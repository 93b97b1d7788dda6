/**
 * Pluralized column names of a record type
 *
 * The mapping depends only on the record type's attributes, never on record
 * contents, so it is built once per registry.
 */

import { pluralize } from "./pluralize.js";
import type { AttributeName } from "./types.js";

export type ProjectionMap<T> = ReadonlyMap<string, AttributeName<T>>;

/**
 * Map each attribute's plural form to the attribute. Built in attribute order,
 * so when two attributes share a plural form the later one wins.
 */
export function buildProjectionMap<T>(attributes: readonly AttributeName<T>[]): ProjectionMap<T> {
  const map = new Map<string, AttributeName<T>>();
  for (const attribute of attributes) {
    map.set(pluralize(attribute), attribute);
  }
  return map;
}
