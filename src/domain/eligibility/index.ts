/**
 * @fileoverview Profit-Sharing Eligibility Rules
 * @description
 * Leaf specifications over employee records: department, role, salary
 * ratio and tenure. Combine them with the specification algebra.
 *
 * @module domain/eligibility
 */

export {
  Department,
  Role,
  FieldEqualsSpecification,
  DepartmentSpecification,
  DirectorBoard,
  AccountingDepartment,
  FinancialDepartment,
  ITDepartment,
  FacilitiesDepartment,
  CustomerExperienceDepartment,
  RoleSpecification,
  Trainee,
} from './departments';

export {
  DEFAULT_BASE_SALARY,
  SalaryNormalizer,
  SalaryGreaterThan,
  SalaryLessThan,
  SalaryBetween,
} from './salary';

export type { DecimalInput } from './salary';

export {
  DAYS_PER_YEAR,
  freezeReferenceTime,
  tenureInYears,
  tenureInDays,
  AdmissionTimeInYearsLessThan,
  AdmissionTimeInYearsGreaterThan,
  AdmissionTimeInYearsBetween,
} from './tenure';

export type { ReferenceTimeInput } from './tenure';
