/**
 * Eligibility - Specification Builder
 *
 * Single-owner builder for specification trees. AND/OR composition extends
 * nodes in place while the tree is being assembled; `build()` seals the
 * result so that later composition by other owners allocates new nodes
 * instead of mutating the published tree.
 *
 * @module domain/specification/builder
 */

import { InvalidCompositionError } from '../exceptions';
import type { ISpecification } from './ISpecification';

/**
 * SpecificationBuilder - fluent construction of a specification tree.
 *
 * @template T - The type of candidate
 *
 * @example
 * ```typescript
 * const rule = new SpecificationBuilder<CandidateLike>()
 *   .start(new ITDepartment())
 *   .and(new SalaryGreaterThan(4))
 *   .and(new AdmissionTimeInYearsGreaterThan(3))
 *   .build();
 *
 * rule.sealed; // true
 * ```
 */
export class SpecificationBuilder<T> {
  private current: ISpecification<T> | null = null;
  private built = false;

  /**
   * Shorthand for `new SpecificationBuilder<T>().start(specification)`.
   */
  static from<T>(specification: ISpecification<T>): SpecificationBuilder<T> {
    return new SpecificationBuilder<T>().start(specification);
  }

  /**
   * Set the root the following operations extend.
   *
   * @throws InvalidCompositionError if a root is already set
   */
  start(specification: ISpecification<T>): this {
    this.assertOpen();
    if (this.current !== null) {
      throw new InvalidCompositionError('Builder already has a root specification');
    }
    this.current = specification;
    return this;
  }

  and(specification: ISpecification<T>): this {
    this.current = this.root().and(specification);
    return this;
  }

  or(specification: ISpecification<T>): this {
    this.current = this.root().or(specification);
    return this;
  }

  xor(specification: ISpecification<T>): this {
    this.current = this.root().xor(specification);
    return this;
  }

  /**
   * Negate everything built so far.
   */
  not(): this {
    this.current = this.root().not();
    return this;
  }

  /**
   * Finish construction and seal the tree.
   *
   * @throws InvalidCompositionError if nothing was started or build() was already called
   */
  build(): ISpecification<T> {
    const root = this.root();
    this.built = true;
    return root.seal();
  }

  private root(): ISpecification<T> {
    this.assertOpen();
    if (this.current === null) {
      throw new InvalidCompositionError('Builder has no root specification; call start() first');
    }
    return this.current;
  }

  private assertOpen(): void {
    if (this.built) {
      throw new InvalidCompositionError('Builder has already been built');
    }
  }
}
