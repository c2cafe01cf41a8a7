/**
 * Eligibility - Tenure Specifications
 *
 * Rules over the time elapsed between the admission date
 * (`data_de_admissao`) and a reference time frozen when the rule is built.
 * Re-evaluating the same rule against the same candidate always yields the
 * same answer, however much wall-clock time has passed.
 *
 * NOTE: `AdmissionTimeInYearsBetween` measures whole days against
 * `years * 365` while the other two rules measure whole calendar years. The
 * two units disagree around leap days; this is intentional and pinned by
 * tests.
 *
 * @module domain/eligibility/tenure
 */

import { differenceInDays, differenceInYears, formatISO } from 'date-fns';
import { Candidate, EmployeeField, parseDate, type CandidateLike } from '../candidate';
import { MalformedValueError } from '../exceptions';
import { SpecificationBase } from '../specification';

/**
 * Days per year used by the day-based tenure rule
 */
export const DAYS_PER_YEAR = 365;

/**
 * Reference time given as a Date or an ISO-8601 string
 */
export type ReferenceTimeInput = Date | string;

/**
 * Resolve the reference time once; defaults to now.
 *
 * @throws MalformedValueError when the input is not a valid date
 */
export function freezeReferenceTime(referenceTime?: ReferenceTimeInput): Date {
  if (referenceTime === undefined) {
    return new Date();
  }
  const result = parseDate('referenceTime', referenceTime);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function toYears(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new MalformedValueError(name, value, 'number of years');
  }
  return value;
}

/**
 * Whole calendar years between two dates, regardless of order.
 */
export function tenureInYears(admission: Date, referenceTime: Date): number {
  return Math.abs(differenceInYears(referenceTime, admission));
}

/**
 * Whole days between two dates, regardless of order.
 */
export function tenureInDays(admission: Date, referenceTime: Date): number {
  return Math.abs(differenceInDays(referenceTime, admission));
}

function admissionOf(candidate: CandidateLike): Date {
  return Candidate.from(candidate).getDate(EmployeeField.DATA_DE_ADMISSAO);
}

/**
 * Common state of the tenure rules: the frozen reference time.
 */
abstract class TenureSpecification extends SpecificationBase<CandidateLike> {
  private readonly referenceEpoch: number;

  protected constructor(referenceTime?: ReferenceTimeInput) {
    super();
    this.referenceEpoch = freezeReferenceTime(referenceTime).getTime();
  }

  /** Copy of the frozen reference time */
  get referenceTime(): Date {
    return new Date(this.referenceEpoch);
  }

  protected yearsOf(candidate: CandidateLike): number {
    return tenureInYears(admissionOf(candidate), new Date(this.referenceEpoch));
  }

  protected daysOf(candidate: CandidateLike): number {
    return tenureInDays(admissionOf(candidate), new Date(this.referenceEpoch));
  }

  protected describeReferenceTime(): string {
    return `referenceTime=${formatISO(this.referenceEpoch)}`;
  }
}

/**
 * Whole years of tenure strictly below the threshold.
 */
export class AdmissionTimeInYearsLessThan extends TenureSpecification {
  readonly threshold: number;

  constructor(threshold: number, referenceTime?: ReferenceTimeInput) {
    super(referenceTime);
    this.threshold = toYears('threshold', threshold);
  }

  isSatisfiedBy(candidate: CandidateLike): boolean {
    return this.yearsOf(candidate) < this.threshold;
  }

  protected describeParameters(): string {
    return `threshold=${this.threshold}, ${this.describeReferenceTime()}`;
  }
}

/**
 * Whole years of tenure at or above the threshold.
 */
export class AdmissionTimeInYearsGreaterThan extends TenureSpecification {
  readonly threshold: number;

  constructor(threshold: number, referenceTime?: ReferenceTimeInput) {
    super(referenceTime);
    this.threshold = toYears('threshold', threshold);
  }

  isSatisfiedBy(candidate: CandidateLike): boolean {
    return this.yearsOf(candidate) >= this.threshold;
  }

  protected describeParameters(): string {
    return `threshold=${this.threshold}, ${this.describeReferenceTime()}`;
  }
}

/**
 * Whole days of tenure strictly between `initial * 365` and `final * 365`.
 */
export class AdmissionTimeInYearsBetween extends TenureSpecification {
  readonly initialDays: number;
  readonly finalDays: number;

  constructor(initial: number, final: number, referenceTime?: ReferenceTimeInput) {
    super(referenceTime);
    this.initialDays = toYears('initial', initial) * DAYS_PER_YEAR;
    this.finalDays = toYears('final', final) * DAYS_PER_YEAR;
  }

  isSatisfiedBy(candidate: CandidateLike): boolean {
    const days = this.daysOf(candidate);
    return this.initialDays < days && days < this.finalDays;
  }

  protected describeParameters(): string {
    return `initialDays=${this.initialDays}, finalDays=${this.finalDays}, ${this.describeReferenceTime()}`;
  }
}
