/**
 * @fileoverview Profit-Sharing Eligibility
 * @description
 * Decides whether an employee record is eligible for a profit-sharing
 * distribution by composing department, role, salary and tenure rules
 * into boolean specifications.
 *
 * ## Layers
 * - **Domain**: candidate accessor, specification algebra, eligibility rules
 * - **Application**: evaluator, configuration, logging
 *
 * @example
 * ```typescript
 * import {
 *   ITDepartment,
 *   SalaryGreaterThan,
 *   AdmissionTimeInYearsLessThan,
 *   SpecificationBuilder,
 *   parseEmployeeRecord,
 * } from 'profit-sharing-eligibility';
 *
 * const rule = SpecificationBuilder.from(new ITDepartment())
 *   .and(new SalaryGreaterThan(4))
 *   .and(new AdmissionTimeInYearsLessThan(2))
 *   .build();
 *
 * const candidate = parseEmployeeRecord(row);
 * rule.isSatisfiedBy(candidate);
 * String(rule.remainderUnsatisfiedBy(candidate));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';
