/**
 * Eligibility - Salary Specifications
 *
 * Rules over the ratio between the gross salary (`salario_bruto`) and a base
 * salary. All arithmetic is exact decimal.
 *
 * @module domain/eligibility/salary
 */

import { Decimal } from 'decimal.js';
import { Candidate, EmployeeField, parseDecimal, type CandidateLike } from '../candidate';
import { MalformedValueError } from '../exceptions';
import { SpecificationBase } from '../specification';

/**
 * Values accepted wherever a decimal parameter is expected
 */
export type DecimalInput = Decimal | number | string;

/**
 * Base salary used when a rule does not supply its own
 */
export const DEFAULT_BASE_SALARY = new Decimal('1045.0');

// Default precision (20 digits) can round a ratio onto its threshold.
const ExactDecimal = Decimal.clone({ precision: 100 });

function toDecimal(name: string, input: DecimalInput): Decimal {
  const result = parseDecimal(name, input);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * SalaryNormalizer - converts a gross salary into a multiple of a base salary.
 *
 * @example
 * ```typescript
 * const normalizer = new SalaryNormalizer('1045.00');
 * normalizer.normalize(new Decimal('5225.00')).toString(); // '5'
 * ```
 */
export class SalaryNormalizer {
  readonly base: Decimal;

  /**
   * @throws MalformedValueError when the base is not a positive decimal
   */
  constructor(base: DecimalInput = DEFAULT_BASE_SALARY) {
    const value = toDecimal('base', base);
    if (!value.greaterThan(0)) {
      throw new MalformedValueError('base', base, 'positive decimal');
    }
    this.base = value;
  }

  normalize(salary: Decimal): Decimal {
    return new ExactDecimal(salary).dividedBy(this.base);
  }

  /**
   * Sign of `salary / base - ratio`, computed as `salary - ratio * base`
   * so no division is rounded.
   */
  compare(salary: Decimal, ratio: Decimal): number {
    return salary.comparedTo(new ExactDecimal(ratio).times(this.base));
  }

  /**
   * Compare the candidate's salary ratio with `ratio`.
   */
  compareRatio(candidate: CandidateLike, ratio: Decimal): number {
    return this.compare(salaryOf(candidate), ratio);
  }
}

function salaryOf(candidate: CandidateLike): Decimal {
  return Candidate.from(candidate).getDecimal(EmployeeField.SALARIO_BRUTO);
}

function toNormalizer(base?: DecimalInput | SalaryNormalizer): SalaryNormalizer {
  if (base instanceof SalaryNormalizer) {
    return base;
  }
  return new SalaryNormalizer(base);
}

/**
 * Salary ratio strictly greater than the threshold.
 */
export class SalaryGreaterThan extends SpecificationBase<CandidateLike> {
  readonly threshold: Decimal;
  readonly normalizer: SalaryNormalizer;

  constructor(threshold: DecimalInput, base?: DecimalInput | SalaryNormalizer) {
    super();
    this.threshold = toDecimal('threshold', threshold);
    this.normalizer = toNormalizer(base);
  }

  isSatisfiedBy(candidate: CandidateLike): boolean {
    return this.normalizer.compareRatio(candidate, this.threshold) > 0;
  }

  protected describeParameters(): string {
    return `threshold=${this.threshold.toString()}`;
  }
}

/**
 * Salary ratio strictly less than the threshold.
 */
export class SalaryLessThan extends SpecificationBase<CandidateLike> {
  readonly threshold: Decimal;
  readonly normalizer: SalaryNormalizer;

  constructor(threshold: DecimalInput, base?: DecimalInput | SalaryNormalizer) {
    super();
    this.threshold = toDecimal('threshold', threshold);
    this.normalizer = toNormalizer(base);
  }

  isSatisfiedBy(candidate: CandidateLike): boolean {
    return this.normalizer.compareRatio(candidate, this.threshold) < 0;
  }

  protected describeParameters(): string {
    return `threshold=${this.threshold.toString()}`;
  }
}

/**
 * Salary ratio within `[first, second]`, both ends inclusive.
 */
export class SalaryBetween extends SpecificationBase<CandidateLike> {
  readonly first: Decimal;
  readonly second: Decimal;
  readonly normalizer: SalaryNormalizer;

  constructor(first: DecimalInput, second: DecimalInput, base?: DecimalInput | SalaryNormalizer) {
    super();
    this.first = toDecimal('first', first);
    this.second = toDecimal('second', second);
    this.normalizer = toNormalizer(base);
  }

  isSatisfiedBy(candidate: CandidateLike): boolean {
    const salary = salaryOf(candidate);
    return this.normalizer.compare(salary, this.first) >= 0 && this.normalizer.compare(salary, this.second) <= 0;
  }

  protected describeParameters(): string {
    return `first=${this.first.toString()}, second=${this.second.toString()}`;
  }
}
