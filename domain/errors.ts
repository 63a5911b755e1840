/**
 * Domain error model: base and concrete error types.
 * Framework-independent.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a value or input fails validation. */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when an invariant is violated. */
export class InvariantViolation extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/**
 * Thrown when text is not a well-formed "yyyy-mm-ddThh:mm:ssZ" timestamp.
 * Malformed input from an external source; reject the enclosing record.
 */
export class TimestampParseError extends ValidationError {
  readonly input: string;

  constructor(input: string) {
    super("cannot parse timestamp", { input });
    this.input = input;
  }
}
