/**
 * Globally unique identifier values
 *
 * Identifier-typed keys are exempt from the uniqueness check, so the registry
 * needs a runtime type that is distinct from plain strings to dispatch on.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { InvalidIdentifierError } from "./errors.js";

const UuidSchema = z.string().uuid();

export class Identifier {
  readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /**
   * Create a random (v4) identifier
   */
  static generate(): Identifier {
    return new Identifier(randomUUID());
  }

  /**
   * Parse an identifier from its canonical UUID text
   * @throws InvalidIdentifierError if the text is not a UUID
   */
  static from(input: string): Identifier {
    const result = UuidSchema.safeParse(input);
    if (!result.success) {
      throw new InvalidIdentifierError(input, { cause: result.error });
    }
    return new Identifier(result.data.toLowerCase());
  }

  equals(other: Identifier): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
