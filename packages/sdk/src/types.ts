/**
 * Core types for the keyed registry
 */

import type { Identifier } from "./identifier.js";
import type { MatchType } from "./keys.js";
import type { Pluralize } from "./pluralize.js";
import type { RegistryEventSink } from "./observability/events.js";

/**
 * Runtime value type carried by each match type
 */
export interface KeyValueMap {
  string: string;
  number: number;
  bigint: bigint;
  boolean: boolean;
  date: Date;
  identifier: Identifier;
}

/**
 * Any value a key declaration can match
 */
export type KeyValue = KeyValueMap[MatchType];

/**
 * Attribute names of a record type
 */
export type AttributeName<T> = keyof T & string;

/**
 * Attribute names of `T` whose value type is `V`
 * @example AttributesOfType<{ name: string; age: number }, string> // "name"
 */
export type AttributesOfType<T, V> = {
  [K in AttributeName<T>]: T[K] extends V ? K : never;
}[AttributeName<T>];

/**
 * One entry of the key schema.
 *
 * The union over match types ties `sourceAttribute` to attributes whose value
 * type agrees with `matchType`.
 */
export type KeyDeclaration<T> = {
  [M in MatchType]: {
    /** Externally visible key name, e.g. "names" */
    projectionName: string;
    /** Attribute read off each record, e.g. "name" */
    sourceAttribute: AttributesOfType<T, KeyValueMap[M]> & AttributeName<T>;
    /** Runtime value type that resolves through this key */
    matchType: M;
  };
}[MatchType];

/**
 * Lookup that names its key declaration explicitly instead of dispatching on
 * the runtime type of the value
 * @example { key: "ids", value: Identifier.from("123e4567-e89b-42d3-a456-426614174000") }
 */
export interface TaggedLookup {
  key: string;
  value: KeyValue;
}

/**
 * Lookup by key value: a bare value (dispatched by runtime type) or a tagged one
 */
export type KeyLookup = KeyValue | TaggedLookup;

/**
 * Anything that resolves to a single record. Bare numbers are positions.
 */
export type Lookup = number | Exclude<KeyValue, number> | TaggedLookup;

/**
 * Capability contract of the element type: its name and the ordered set of
 * attribute names the projections are derived from
 */
export interface RecordType<T> {
  readonly name: string;
  readonly attributes: readonly AttributeName<T>[];
}

/**
 * Pluralized projection names of a record type
 * @example ProjectionName<{ name: string; category: string }> // "names" | "categories"
 */
export type ProjectionName<T> = {
  [K in AttributeName<T>]: Pluralize<K>;
}[AttributeName<T>];

/**
 * Attribute behind a projection name
 */
export type AttributeForProjection<T, P extends string> = {
  [K in AttributeName<T>]: Pluralize<K> extends P ? K : never;
}[AttributeName<T>];

/**
 * Registry construction options
 */
export interface RegistryOptions<T> {
  /** Element type contract */
  recordType: RecordType<T>;
  /** Key schema, validated once and immutable afterwards */
  keys: readonly KeyDeclaration<T>[];
  /** Initial records, checked for uniqueness like appended ones and frozen in place */
  records?: readonly T[];
  /** Receives registry events (default: debug logging) */
  sink?: RegistryEventSink;
}
