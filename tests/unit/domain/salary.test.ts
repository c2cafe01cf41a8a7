/**
 * @fileoverview Unit tests for salary normalization and salary-ratio specifications
 */

import { Decimal } from 'decimal.js';
import {
  DEFAULT_BASE_SALARY,
  SalaryNormalizer,
  SalaryGreaterThan,
  SalaryLessThan,
  SalaryBetween,
  MissingFieldError,
  MalformedValueError,
} from '../../../src';

// Ratio 4 against the default base of 1045
const AT_FOUR = { salario_bruto: '4180.00' };
// Ratio 5 against the default base
const AT_FIVE = { salario_bruto: '5225.00' };

describe('SalaryNormalizer', () => {
  it('should default to the base salary constant', () => {
    expect(new SalaryNormalizer().base.equals(DEFAULT_BASE_SALARY)).toBe(true);
    expect(DEFAULT_BASE_SALARY.toString()).toBe('1045');
  });

  it('should divide by the base exactly', () => {
    expect(new SalaryNormalizer('1045.00').normalize(new Decimal('5225.00')).toString()).toBe('5');
    expect(new SalaryNormalizer('0.1').normalize(new Decimal('0.3')).toString()).toBe('3');
  });

  it('should keep digits beyond the default decimal precision', () => {
    const normalizer = new SalaryNormalizer();
    const salary = new Decimal('5225.00000000000000000001');

    expect(normalizer.normalize(salary).greaterThan(5)).toBe(true);
    expect(normalizer.compare(salary, new Decimal(5))).toBe(1);
    expect(normalizer.compare(new Decimal('5225'), new Decimal(5))).toBe(0);
    expect(normalizer.compareRatio(AT_FOUR, new Decimal(5))).toBe(-1);
  });

  it('should reject a base that is not a positive decimal', () => {
    expect(() => new SalaryNormalizer(0)).toThrowErrorType(MalformedValueError);
    expect(() => new SalaryNormalizer('-1045')).toThrowErrorType(MalformedValueError);
    expect(() => new SalaryNormalizer('abc')).toThrow('Field "base" is not a valid decimal: abc');
  });
});

describe('Salary specifications', () => {
  // ==========================================================================
  // STRICT COMPARISONS
  // ==========================================================================

  describe('SalaryGreaterThan', () => {
    it('should be satisfied above the threshold', () => {
      expect(new SalaryGreaterThan(4).isSatisfiedBy(AT_FIVE)).toBe(true);
    });

    it('should not be satisfied at the exact threshold', () => {
      expect(new SalaryGreaterThan(4).isSatisfiedBy(AT_FOUR)).toBe(false);
    });

    it('should be satisfied by a ratio a hair above the threshold', () => {
      const justAboveFive = { salario_bruto: '5225.00000000000000000001' };

      expect(new SalaryGreaterThan(5).isSatisfiedBy(justAboveFive)).toBe(true);
      expect(new SalaryLessThan(5).isSatisfiedBy(justAboveFive)).toBe(false);
      expect(new SalaryBetween(1, 5).isSatisfiedBy(justAboveFive)).toBe(false);
    });

    it('should use a per-rule base salary', () => {
      // 4180 / 1000 = 4.18
      expect(new SalaryGreaterThan(4, '1000').isSatisfiedBy(AT_FOUR)).toBe(true);
      expect(new SalaryGreaterThan(4, new SalaryNormalizer(2090)).isSatisfiedBy(AT_FOUR)).toBe(false);
    });

    it('should render its threshold', () => {
      expect(String(new SalaryGreaterThan(4))).toBe('SalaryGreaterThan(threshold=4)');
    });
  });

  describe('SalaryLessThan', () => {
    it('should be satisfied below the threshold', () => {
      expect(new SalaryLessThan(5).isSatisfiedBy(AT_FOUR)).toBe(true);
    });

    it('should not be satisfied at the exact threshold', () => {
      expect(new SalaryLessThan(4).isSatisfiedBy(AT_FOUR)).toBe(false);
    });

    it('should accept decimal thresholds', () => {
      // 5225 / 1045 = 5
      expect(new SalaryLessThan('5.01').isSatisfiedBy(AT_FIVE)).toBe(true);
      expect(new SalaryLessThan(new Decimal('4.99')).isSatisfiedBy(AT_FIVE)).toBe(false);
    });
  });

  // ==========================================================================
  // INCLUSIVE RANGE
  // ==========================================================================

  describe('SalaryBetween', () => {
    const between = new SalaryBetween(4, 5);

    it('should be satisfied at both endpoints', () => {
      expect(between.isSatisfiedBy(AT_FOUR)).toBe(true);
      expect(between.isSatisfiedBy(AT_FIVE)).toBe(true);
    });

    it('should be satisfied inside and not outside the range', () => {
      expect(between.isSatisfiedBy({ salario_bruto: 4702.5 })).toBe(true);
      expect(between.isSatisfiedBy({ salario_bruto: '4179.99' })).toBe(false);
      expect(between.isSatisfiedBy({ salario_bruto: '5225.01' })).toBe(false);
    });

    it('should compare exactly where binary floating point would not', () => {
      expect(new SalaryBetween(3, 3, '0.1').isSatisfiedBy({ salario_bruto: '0.3' })).toBe(true);
    });

    it('should render its bounds', () => {
      expect(String(new SalaryBetween('1.5', 3))).toBe('SalaryBetween(first=1.5, second=3)');
    });
  });

  // ==========================================================================
  // ERRORS
  // ==========================================================================

  describe('Errors', () => {
    it('should fail on a missing salary', () => {
      expect(() => new SalaryGreaterThan(4).isSatisfiedBy({ area: 'Tecnologia' })).toThrowErrorType(MissingFieldError);
    });

    it('should fail on a malformed salary', () => {
      expect(() => new SalaryBetween(1, 2).isSatisfiedBy({ salario_bruto: 'R$ 5.225,00' })).toThrowErrorType(
        MalformedValueError,
      );
    });

    it('should reject a malformed threshold at construction', () => {
      expect(() => new SalaryGreaterThan('four')).toThrow('Field "threshold" is not a valid decimal: four');
    });
  });
});
