/**
 * In-memory registry of records indexed by several declared keys
 *
 * Invariants:
 * - Records keep insertion order; that order is the iteration order
 * - No two records share a value for any key whose match type is not "identifier"
 * - Uniqueness is checked before a record is written, so a failed write leaves
 *   the store untouched for that record (earlier items of a batch stay applied)
 * - The key schema and the projection mapping never change after construction
 * - Stored records are frozen (shallowly, in place) when written, so key values
 *   only change through replace()
 *
 * Single-threaded and synchronous: callers sharing a registry must serialize
 * access themselves.
 */

import {
  AmbiguousKeyError,
  AttributeNotFoundError,
  CountMismatchError,
  DuplicateKeyError,
  IndexOutOfRangeError,
  KeyNotFoundError,
  describeValue,
} from "./errors.js";
import { compileKeys, isTaggedLookup, keyEquals, matchTypeOf } from "./keys.js";
import type { CompiledKey } from "./keys.js";
import { buildProjectionMap } from "./projection.js";
import type { ProjectionMap } from "./projection.js";
import { loggerSink } from "./observability/events.js";
import type { RegistryEventSink } from "./observability/events.js";
import { metrics } from "./observability/metrics.js";
import { validateKeySchema } from "./validation.js";
import type {
  AttributeForProjection,
  AttributeName,
  KeyLookup,
  Lookup,
  ProjectionName,
  RecordType,
  RegistryOptions,
} from "./types.js";

/**
 * Return a list, wrapping a single item
 */
function ensureList<V>(itemOrList: V | readonly V[]): readonly V[] {
  return isList(itemOrList) ? itemOrList : [itemOrList];
}

function isList<V>(value: V | readonly V[]): value is readonly V[] {
  return Array.isArray(value);
}

export class Registry<T extends object> implements Iterable<T> {
  readonly recordType: RecordType<T>;
  readonly #keys: readonly CompiledKey<T>[];
  readonly #projections: ProjectionMap<T>;
  readonly #records: T[] = [];
  readonly #sink: RegistryEventSink;

  /**
   * @throws SchemaError if the record type or key schema is invalid
   * @throws DuplicateKeyError if the initial records collide on a unique key
   */
  constructor(options: RegistryOptions<T>) {
    validateKeySchema(options.recordType, options.keys);

    this.recordType = {
      name: options.recordType.name,
      attributes: Object.freeze([...options.recordType.attributes]),
    };
    this.#keys = Object.freeze(compileKeys(options.keys));
    this.#projections = buildProjectionMap(this.recordType.attributes);
    this.#sink = options.sink ?? loggerSink;

    for (const record of options.records ?? []) {
      this.#checkUnique(record);
      Object.freeze(record);
      this.#records.push(record);
    }

    this.#sink.emit({
      type: "registry.init",
      recordType: this.recordType.name,
      records: this.#records.length,
      keys: this.keyNames,
    });
  }

  /**
   * Number of records
   */
  get size(): number {
    return this.#records.length;
  }

  /**
   * Snapshot of the records in store order
   */
  get records(): readonly T[] {
    return this.#records.slice();
  }

  /**
   * Projection names of the key schema, in schema order
   */
  get keyNames(): string[] {
    return this.#keys.map((key) => key.projectionName);
  }

  /**
   * Pluralized names accepted by project()
   */
  get projectionNames(): string[] {
    return [...this.#projections.keys()];
  }

  // ============================================================================
  // Mutation
  // ============================================================================

  /**
   * Append one or more records, in argument order.
   * Stops at the first duplicate; records appended before it stay.
   * Each appended record is frozen in place.
   * @throws DuplicateKeyError
   */
  append(records: T | readonly T[]): void {
    for (const record of ensureList(records)) {
      this.#checkUnique(record);
      Object.freeze(record);
      this.#records.push(record);
      this.#sink.emit({
        type: "record.append",
        recordType: this.recordType.name,
        index: this.#records.length - 1,
        size: this.#records.length,
      });
    }
  }

  /**
   * Overwrite the records at the given lookups, pairwise with `values`.
   * Each stored value is frozen in place.
   * @throws CountMismatchError if the counts differ
   * @throws DuplicateKeyError if a value collides with another record
   */
  replace(lookups: Lookup | readonly Lookup[], values: T | readonly T[]): void {
    const indices = this.resolveIndices(lookups);
    const list = ensureList(values);
    if (indices.length !== list.length) {
      throw new CountMismatchError(indices.length, list.length);
    }

    for (let i = 0; i < indices.length; i++) {
      const index = indices[i];
      const value = list[i];
      this.#checkUnique(value, index);
      Object.freeze(value);
      this.#records[index] = value;
      this.#sink.emit({ type: "record.replace", recordType: this.recordType.name, index });
    }
  }

  /**
   * Remove the records at the given lookups.
   * All lookups are resolved before anything is removed; a record reached by
   * more than one lookup is removed once.
   * @returns Removed records, highest index first
   */
  delete(lookups: Lookup | readonly Lookup[]): T[] {
    const indices = [...new Set(this.resolveIndices(lookups))].sort((a, b) => b - a);

    const removed: T[] = [];
    for (const index of indices) {
      const [record] = this.#records.splice(index, 1);
      removed.push(record);
      this.#sink.emit({
        type: "record.delete",
        recordType: this.recordType.name,
        index,
        size: this.#records.length,
      });
    }
    return removed;
  }

  /**
   * Remove every record; the key schema is kept
   */
  clear(): void {
    const removed = this.#records.length;
    this.#records.length = 0;
    this.#sink.emit({ type: "registry.clear", recordType: this.recordType.name, removed });
  }

  // ============================================================================
  // Read access
  // ============================================================================

  /**
   * Record at a position or key
   * @throws IndexOutOfRangeError | KeyNotFoundError | AmbiguousKeyError
   */
  get(lookup: Lookup): T {
    return this.#records[this.resolveIndex(lookup)];
  }

  /**
   * Records for each lookup, in lookup order
   */
  getMany(lookups: readonly Lookup[]): T[] {
    return this.resolveIndices(lookups).map((index) => this.#records[index]);
  }

  /**
   * Like get(), but undefined where get() would report a missing key or position
   * @throws AmbiguousKeyError
   */
  find(lookup: Lookup): T | undefined {
    if (typeof lookup === "number") {
      return this.#inRange(lookup) ? this.#records[lookup] : undefined;
    }
    const index = this.resolveByKey(lookup);
    return index === undefined ? undefined : this.#records[index];
  }

  has(lookup: Lookup): boolean {
    return this.find(lookup) !== undefined;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    yield* this.#records.slice();
  }

  // ============================================================================
  // Index resolution
  // ============================================================================

  /**
   * Index of the record matching a key value.
   *
   * A bare value is looked up under the first declaration, in schema order,
   * whose match type is the value's runtime type; later declarations of the
   * same type are never searched. A tagged lookup names its declaration.
   *
   * @returns Index, or undefined if nothing matches
   * @throws AmbiguousKeyError if more than one record matches
   */
  resolveByKey(lookup: KeyLookup): number | undefined {
    const [key, value] = this.#selectKey(lookup);
    const recordType = this.recordType.name;

    if (!key) {
      this.#sink.emit({ type: "key.miss", recordType, value: describeValue(lookup) });
      return undefined;
    }

    const startTime = performance.now();
    const matches: number[] = [];
    this.#records.forEach((record, index) => {
      if (keyEquals(key.extract(record), value)) {
        matches.push(index);
      }
    });
    metrics.recordLookupTime(recordType, key.projectionName, performance.now() - startTime);

    if (matches.length === 0) {
      metrics.recordMiss(recordType, key.projectionName);
      this.#sink.emit({
        type: "key.miss",
        recordType,
        key: key.projectionName,
        value: describeValue(value),
      });
      return undefined;
    }
    if (matches.length > 1) {
      throw new AmbiguousKeyError(key.projectionName, value, matches);
    }

    const [index] = matches;
    metrics.recordHit(recordType, key.projectionName);
    this.#sink.emit({
      type: "key.resolve",
      recordType,
      key: key.projectionName,
      value: describeValue(value),
      index,
    });
    return index;
  }

  /**
   * Index for a position or key
   * @throws IndexOutOfRangeError if a position is outside the store
   * @throws KeyNotFoundError if a key matches nothing
   */
  resolveIndex(lookup: Lookup): number {
    if (typeof lookup === "number") {
      if (!this.#inRange(lookup)) {
        throw new IndexOutOfRangeError(lookup, this.#records.length);
      }
      return lookup;
    }

    const index = this.resolveByKey(lookup);
    if (index === undefined) {
      throw new KeyNotFoundError(lookup);
    }
    return index;
  }

  /**
   * Indices for one lookup or an ordered list of them, in the same order.
   * Repeated indices are kept.
   */
  resolveIndices(lookups: Lookup | readonly Lookup[]): number[] {
    return ensureList(lookups).map((lookup) => this.resolveIndex(lookup));
  }

  // ============================================================================
  // Projections
  // ============================================================================

  /**
   * Values of one attribute across all records, in store order
   * @throws AttributeNotFoundError if the attribute is not part of the record type
   */
  column<K extends AttributeName<T>>(attribute: K): T[K][] {
    if (!this.recordType.attributes.includes(attribute)) {
      throw new AttributeNotFoundError(attribute, this.recordType.name);
    }
    return this.#records.map((record) => record[attribute]);
  }

  /**
   * Values of an attribute under its pluralized name, e.g. "names" for "name"
   * @throws AttributeNotFoundError if the name is not a projection
   */
  project<P extends ProjectionName<T>>(name: P): T[AttributeForProjection<T, P>][];
  project(name: string): unknown[];
  project(name: string): unknown[] {
    const attribute = this.#projections.get(name);
    if (attribute === undefined) {
      throw new AttributeNotFoundError(name, this.recordType.name);
    }
    return this.column(attribute);
  }

  /**
   * Summary for diagnostics, e.g. "Registry<Person>: 2 records, keys: [names, ids]"
   */
  toString(): string {
    return (
      `Registry<${this.recordType.name}>: ${this.#records.length} records, ` +
      `keys: [${this.keyNames.join(", ")}]`
    );
  }

  // ============================================================================
  // Internals
  // ============================================================================

  /**
   * Declaration and value a key lookup resolves through
   */
  #selectKey(lookup: KeyLookup): [CompiledKey<T> | undefined, unknown] {
    if (isTaggedLookup(lookup)) {
      const name = lookup.key;
      return [this.#keys.find((key) => key.projectionName === name), lookup.value];
    }
    const matchType = matchTypeOf(lookup);
    return [this.#keys.find((key) => key.matchType === matchType), lookup];
  }

  /**
   * @throws DuplicateKeyError on the first unique key the record collides on
   */
  #checkUnique(record: T, excludeIndex?: number): void {
    for (const key of this.#keys) {
      if (!key.unique) continue;

      const value = key.extract(record);
      const collides = this.#records.some(
        (existing, index) => index !== excludeIndex && keyEquals(key.extract(existing), value)
      );
      if (collides) {
        throw new DuplicateKeyError(key.projectionName, value);
      }
    }
  }

  #inRange(position: number): boolean {
    return Number.isInteger(position) && position >= 0 && position < this.#records.length;
  }
}
