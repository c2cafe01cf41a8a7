/**
 * @fileoverview Candidate Accessor Exports
 * @description
 * Typed, read-only access to the record under evaluation.
 *
 * @module domain/candidate
 */

export { Candidate, parseDecimal, parseDate } from './ICandidate';

export type {
  ICandidate,
  CandidateLike,
  CandidateRecord,
  FieldError,
  FieldResult,
} from './ICandidate';

export {
  EmployeeField,
  validateEmployeeRecord,
  parseEmployeeRecord,
} from './EmployeeRecord';

export type { EmployeeFieldName, EmployeeRecord } from './EmployeeRecord';
