import type { AttributeName, RecordType } from "./types.js";

/**
 * Declare the element type of a registry: its name and ordered attribute names.
 * Validation happens when a registry is built from it.
 * @example defineRecordType<Person>("Person", ["name", "id", "age"])
 */
export function defineRecordType<T extends object>(
  name: string,
  attributes: readonly AttributeName<T>[]
): RecordType<T> {
  return { name, attributes: Object.freeze([...attributes]) };
}
