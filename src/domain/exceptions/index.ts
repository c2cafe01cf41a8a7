/**
 * Eligibility - Exception Module
 *
 * Errors raised by candidate access and specification evaluation
 */

export {
  SpecificationError,
  MissingFieldError,
  MalformedValueError,
  InvalidCompositionError,
  UnimplementedOperationError,
  CandidateValidationError,
  isSpecificationError,
} from './exceptions';

export type { SpecificationErrorCode } from './exceptions';
