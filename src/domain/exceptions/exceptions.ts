/**
 * Eligibility - Specification Exceptions
 *
 * Error hierarchy raised while reading candidates and evaluating
 * specification trees. Every error carries a stable `code` so callers can
 * branch without relying on `instanceof` across module boundaries.
 */

/**
 * Stable error codes
 */
export type SpecificationErrorCode =
  | 'MISSING_FIELD'
  | 'MALFORMED_VALUE'
  | 'INVALID_COMPOSITION'
  | 'UNIMPLEMENTED_OPERATION'
  | 'CANDIDATE_VALIDATION';

/**
 * Base class for all specification errors
 */
export class SpecificationError extends Error {
  constructor(
    public readonly code: SpecificationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'SpecificationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Required candidate field is absent
 */
export class MissingFieldError extends SpecificationError {
  constructor(public readonly field: string) {
    super('MISSING_FIELD', `Candidate field "${field}" is missing`);
    this.name = 'MissingFieldError';
  }
}

/**
 * Candidate field (or rule parameter) is present but cannot be parsed
 */
export class MalformedValueError extends SpecificationError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    expected: string,
  ) {
    super(
      'MALFORMED_VALUE',
      `Field "${field}" is not a valid ${expected}: ${String(value)}`,
    );
    this.name = 'MalformedValueError';
  }
}

/**
 * Specification tree cannot be evaluated or built as requested
 */
export class InvalidCompositionError extends SpecificationError {
  constructor(message: string) {
    super('INVALID_COMPOSITION', message);
    this.name = 'InvalidCompositionError';
  }
}

/**
 * A specification subclass did not override an operation it must provide
 */
export class UnimplementedOperationError extends SpecificationError {
  constructor(
    public readonly specification: string,
    public readonly operation: string,
  ) {
    super(
      'UNIMPLEMENTED_OPERATION',
      `${specification} does not implement ${operation}()`,
    );
    this.name = 'UnimplementedOperationError';
  }
}

/**
 * Boundary validation of a raw employee record failed.
 * `errors` maps each offending field to its messages.
 */
export class CandidateValidationError extends SpecificationError {
  constructor(
    public readonly errors: Record<string, string[]> = {},
    message: string = 'Candidate validation failed',
  ) {
    super('CANDIDATE_VALIDATION', message);
    this.name = 'CandidateValidationError';
  }
}

/**
 * Narrow an unknown thrown value to a SpecificationError
 */
export function isSpecificationError(error: unknown): error is SpecificationError {
  return error instanceof SpecificationError;
}
