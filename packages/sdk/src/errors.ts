/**
 * Error types for registry operations
 *
 * Invariants:
 * - Every error is thrown synchronously, before the store is touched for the
 *   record (or key) that failed
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all registry errors
 */
export abstract class RegistryError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a key schema or record type fails validation at construction
 */
export class SchemaError extends RegistryError {
  readonly code = "E_SCHEMA";

  constructor(
    public readonly issues: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Invalid key schema: ${issues.join("; ")}`, options);
  }
}

/**
 * Thrown when a write would give two records the same value for a unique key
 */
export class DuplicateKeyError extends RegistryError {
  readonly code = "E_DUPLICATE_KEY";

  constructor(
    public readonly projectionName: string,
    public readonly value: unknown,
    options?: ErrorOptions
  ) {
    super(`Duplicate value for key '${projectionName}': ${describeValue(value)}`, options);
  }
}

/**
 * Thrown when a key lookup matches more than one record
 */
export class AmbiguousKeyError extends RegistryError {
  readonly code = "E_AMBIGUOUS_KEY";

  constructor(
    public readonly projectionName: string,
    public readonly value: unknown,
    public readonly matches: readonly number[],
    options?: ErrorOptions
  ) {
    super(
      `Ambiguous key value ${describeValue(value)} for key '${projectionName}'; ` +
        `${matches.length} records found.`,
      options
    );
  }
}

/**
 * Thrown when a key lookup resolves to no record
 */
export class KeyNotFoundError extends RegistryError {
  readonly code = "E_KEY_NOT_FOUND";

  constructor(
    public readonly key: unknown,
    options?: ErrorOptions
  ) {
    super(`Key ${describeValue(key)} not found.`, options);
  }
}

/**
 * Thrown when a positional lookup falls outside the store
 */
export class IndexOutOfRangeError extends RegistryError {
  readonly code = "E_INDEX_RANGE";

  constructor(
    public readonly index: number,
    public readonly size: number,
    options?: ErrorOptions
  ) {
    super(`Index ${index} out of range (size ${size}).`, options);
  }
}

/**
 * Thrown when a batched replace gets a different number of keys and values
 */
export class CountMismatchError extends RegistryError {
  readonly code = "E_COUNT_MISMATCH";

  constructor(
    public readonly keys: number,
    public readonly values: number,
    options?: ErrorOptions
  ) {
    super(`Number of keys and values must match: got ${keys} keys and ${values} values.`, options);
  }
}

/**
 * Thrown when a projection or column names no attribute of the record type
 */
export class AttributeNotFoundError extends RegistryError {
  readonly code = "E_ATTRIBUTE";

  constructor(
    public readonly attribute: string,
    public readonly recordType: string,
    options?: ErrorOptions
  ) {
    super(`Registry<${recordType}> has no attribute '${attribute}'`, options);
  }
}

/**
 * Thrown when a string cannot be parsed as an identifier
 */
export class InvalidIdentifierError extends RegistryError {
  readonly code = "E_IDENTIFIER";

  constructor(
    public readonly input: string,
    options?: ErrorOptions
  ) {
    super(`Invalid identifier: "${input}"`, options);
  }
}

/**
 * Render a key value or lookup for an error message
 */
export function describeValue(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (typeof value === "bigint") {
    return `${value}n`;
  }
  if (typeof value === "object" && value !== null && "key" in value && "value" in value) {
    return `${String(value.key)}=${describeValue(value.value)}`;
  }
  return String(value);
}
