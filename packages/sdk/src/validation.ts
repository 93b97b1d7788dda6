/**
 * Validation of registry options: record type contract and key schema
 *
 * Zod schemas give runtime checks for configuration that may come from
 * untyped callers; failures are reported as a single SchemaError.
 */

import { z } from "zod";
import { SchemaError } from "./errors.js";
import { IDENTIFIER_MATCH_TYPE, MATCH_TYPES } from "./keys.js";
import type { KeyDeclaration, RecordType } from "./types.js";

/**
 * Bare identifier: a letter or underscore, then letters, digits or underscores
 * (purely numeric and empty names never match)
 */
const IDENTIFIER_PATTERN = /^[\p{L}_][\p{L}\p{N}_]*$/u;

const IdentifierNameSchema = (label: string) =>
  z.string().superRefine((val, ctx) => {
    if (!IDENTIFIER_PATTERN.test(val)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${label} '${val}'; must be a valid non-numeric identifier.`,
      });
    }
  });

export const KeyDeclarationSchema = z.object({
  projectionName: IdentifierNameSchema("projection name"),
  sourceAttribute: z.string().min(1, "source attribute must be non-empty"),
  matchType: z.enum(MATCH_TYPES),
});

/**
 * At most one declaration per non-identifier match type, projection names unique
 */
export const KeySchemaSchema = z.array(KeyDeclarationSchema).superRefine((declarations, ctx) => {
  const byType = new Map<string, string>();
  const names = new Set<string>();

  declarations.forEach((declaration, index) => {
    if (names.has(declaration.projectionName)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "projectionName"],
        message: `Duplicate projection name '${declaration.projectionName}'.`,
      });
    }
    names.add(declaration.projectionName);

    if (declaration.matchType === IDENTIFIER_MATCH_TYPE) {
      return;
    }
    const previous = byType.get(declaration.matchType);
    if (previous !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "matchType"],
        message:
          `Duplicate match type '${declaration.matchType}' used for ` +
          `'${previous}' and '${declaration.projectionName}'.`,
      });
      return;
    }
    byType.set(declaration.matchType, declaration.projectionName);
  });
});

export const RecordTypeSchema = z.object({
  name: z.string().min(1, "record type name must be non-empty"),
  attributes: z
    .array(IdentifierNameSchema("attribute"))
    .min(1, "record type must declare at least one attribute")
    .superRefine((attributes, ctx) => {
      const seen = new Set<string>();
      attributes.forEach((attribute, index) => {
        if (seen.has(attribute)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index],
            message: `Duplicate attribute '${attribute}'.`,
          });
        }
        seen.add(attribute);
      });
    }),
});

export const RegistryOptionsSchema = z
  .object({
    recordType: RecordTypeSchema,
    keys: KeySchemaSchema,
  })
  .superRefine((options, ctx) => {
    const attributes = new Set(options.recordType.attributes);
    options.keys.forEach((declaration, index) => {
      if (!attributes.has(declaration.sourceAttribute)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["keys", index, "sourceAttribute"],
          message:
            `Key '${declaration.projectionName}' reads unknown attribute ` +
            `'${declaration.sourceAttribute}' of ${options.recordType.name}.`,
        });
      }
    });
  });

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a record type and its key schema
 * @throws SchemaError listing every issue found
 */
export function validateKeySchema<T>(
  recordType: RecordType<T>,
  keys: readonly KeyDeclaration<T>[]
): void {
  const result = RegistryOptionsSchema.safeParse({ recordType, keys });
  if (!result.success) {
    throw new SchemaError(formatIssues(result.error), { cause: result.error });
  }
}
