/**
 * Keyed Registry SDK
 *
 * An in-memory, ordered record container with several unique keys and
 * pluralized column projections
 */

// Re-export types
export type {
  AttributeForProjection,
  AttributeName,
  AttributesOfType,
  KeyDeclaration,
  KeyLookup,
  KeyValue,
  KeyValueMap,
  Lookup,
  ProjectionName,
  RecordType,
  RegistryOptions,
  TaggedLookup,
} from "./types.js";
export type { MatchType, CompiledKey } from "./keys.js";
export type { Pluralize } from "./pluralize.js";
export type { ProjectionMap } from "./projection.js";

// Registry
export { Registry } from "./registry.js";
export { defineRecordType } from "./record-type.js";
export { Identifier } from "./identifier.js";

// Re-export utilities
export { MATCH_TYPES, IDENTIFIER_MATCH_TYPE, keyEquals, matchTypeOf } from "./keys.js";
export { pluralize } from "./pluralize.js";
export { buildProjectionMap } from "./projection.js";
export {
  KeyDeclarationSchema,
  KeySchemaSchema,
  RecordTypeSchema,
  RegistryOptionsSchema,
  validateKeySchema,
} from "./validation.js";

// Re-export observability
export type { RegistryEvent, RegistryEventSink, RegistryEventType } from "./observability/events.js";
export { loggerSink, nullSink, RecordingSink } from "./observability/events.js";
export type { LogEntry } from "./observability/logs.js";
export { logger } from "./observability/logs.js";
export type { LookupMetrics } from "./observability/metrics.js";
export { metrics } from "./observability/metrics.js";

// Re-export errors
export {
  RegistryError,
  SchemaError,
  DuplicateKeyError,
  AmbiguousKeyError,
  KeyNotFoundError,
  IndexOutOfRangeError,
  CountMismatchError,
  AttributeNotFoundError,
  InvalidIdentifierError,
} from "./errors.js";
