/**
 * Eligibility - Employee Record Contract
 *
 * Field names and boundary validation for the employee records consumed by
 * the profit-sharing predicates.
 */

import type { Decimal } from 'decimal.js';
import { CandidateValidationError } from '../exceptions';
import { Candidate, type CandidateRecord, type FieldResult, type ICandidate } from './ICandidate';

/**
 * Keys of the employee record
 */
export const EmployeeField = {
  /** Department name */
  AREA: 'area',
  /** Role / title */
  CARGO: 'cargo',
  /** Gross salary */
  SALARIO_BRUTO: 'salario_bruto',
  /** Admission date */
  DATA_DE_ADMISSAO: 'data_de_admissao',
} as const;

export type EmployeeFieldName = (typeof EmployeeField)[keyof typeof EmployeeField];

/**
 * Typed shape of an employee record as produced by a loader.
 * Extra keys are carried through untouched.
 */
export interface EmployeeRecord {
  area: string;
  cargo: string;
  salario_bruto: string | number | Decimal;
  data_de_admissao: string | Date;
  [key: string]: unknown;
}

const FIELD_READERS: Record<EmployeeFieldName, (candidate: ICandidate, key: string) => FieldResult<unknown>> = {
  area: (candidate, key) => candidate.readString(key),
  cargo: (candidate, key) => candidate.readString(key),
  salario_bruto: (candidate, key) => candidate.readDecimal(key),
  data_de_admissao: (candidate, key) => candidate.readDate(key),
};

/**
 * Check every known employee field once.
 *
 * @returns Map of field name to error messages; empty when the record is valid
 *
 * @example
 * ```typescript
 * validateEmployeeRecord({ area: 'Tecnologia' });
 * // {
 * //   cargo: ['Candidate field "cargo" is missing'],
 * //   salario_bruto: ['Candidate field "salario_bruto" is missing'],
 * //   data_de_admissao: ['Candidate field "data_de_admissao" is missing'],
 * // }
 * ```
 */
export function validateEmployeeRecord(record: CandidateRecord): Record<string, string[]> {
  const candidate = Candidate.from(record);
  const errors: Record<string, string[]> = {};

  for (const [field, read] of Object.entries(FIELD_READERS)) {
    const result = read(candidate, field);
    if (!result.ok) {
      errors[field] = [result.error.message];
    }
  }

  return errors;
}

/**
 * Validate and wrap an employee record.
 *
 * @throws CandidateValidationError listing every invalid field
 */
export function parseEmployeeRecord(record: CandidateRecord): ICandidate {
  const errors = validateEmployeeRecord(record);
  const fields = Object.keys(errors);

  if (fields.length > 0) {
    throw new CandidateValidationError(
      errors,
      `Employee record has invalid fields: ${fields.join(', ')}`,
    );
  }

  return Candidate.from(record);
}
