/**
 * @fileoverview Unit tests for SpecificationBuilder
 */

import {
  SpecificationBuilder,
  AndSpecification,
  NotSpecification,
  Specifications,
  InvalidCompositionError,
} from '../../../src';

type Flags = Record<string, boolean>;

const flag = (name: string) => Specifications.where<Flags>((flags) => flags[name] === true);

describe('SpecificationBuilder', () => {
  it('should build a flattened, sealed tree', () => {
    const rule = SpecificationBuilder.from(flag('a')).and(flag('b')).and(flag('c')).build();

    expect(rule).toBeInstanceOf(AndSpecification);
    expect(rule instanceof AndSpecification && rule.specifications.length).toBe(3);
    expect(rule.sealed).toBe(true);
    expect(rule.isSatisfiedBy({ a: true, b: true, c: true })).toBe(true);
    expect(rule.isSatisfiedBy({ a: true, b: true })).toBe(false);
  });

  it('should negate everything built so far', () => {
    const rule = new SpecificationBuilder<Flags>().start(flag('a')).or(flag('b')).not().build();

    expect(rule).toBeInstanceOf(NotSpecification);
    expect(rule.isSatisfiedBy({})).toBe(true);
    expect(rule.isSatisfiedBy({ b: true })).toBe(false);
  });

  it('should combine with XOR', () => {
    const rule = SpecificationBuilder.from(flag('a')).xor(flag('b')).build();

    expect(rule.isSatisfiedBy({ a: true, b: true })).toBe(false);
    expect(rule.isSatisfiedBy({ b: true })).toBe(true);
  });

  it('should leave a built tree untouched by later composition', () => {
    const rule = SpecificationBuilder.from(flag('a')).and(flag('b')).build();

    const extended = rule.and(flag('c'));

    expect(extended).not.toBe(rule);
    expect(rule instanceof AndSpecification && rule.specifications.length).toBe(2);
    expect(extended instanceof AndSpecification && extended.specifications.length).toBe(3);
  });

  it('should reject operations before start()', () => {
    const builder = new SpecificationBuilder<Flags>();

    expect(() => builder.and(flag('a'))).toThrowErrorType(InvalidCompositionError);
    expect(() => builder.build()).toThrow('Builder has no root specification; call start() first');
  });

  it('should reject a second start()', () => {
    const builder = SpecificationBuilder.from(flag('a'));

    expect(() => builder.start(flag('b'))).toThrow('Builder already has a root specification');
  });

  it('should reject use after build()', () => {
    const builder = SpecificationBuilder.from(flag('a'));
    builder.build();

    expect(() => builder.build()).toThrow('Builder has already been built');
    expect(() => builder.or(flag('b'))).toThrowErrorType(InvalidCompositionError);
  });
});
