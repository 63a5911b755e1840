/**
 * Domain validation: assertions and invariants.
 * Framework-independent.
 */

import { InvariantViolation, ValidationError, type ErrorMetadata } from "./errors.js";

/** Throws ValidationError if condition is falsy. TypeScript narrows after a successful call. */
export function assert(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new ValidationError(message, metadata);
  }
}

/** Same as assert, but for conditions the code itself guarantees. */
export function invariant(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message, metadata);
  }
}
