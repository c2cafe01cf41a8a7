/**
 * Eligibility - Specification Pattern
 *
 * Composable boolean predicates over a candidate. Specifications combine
 * with AND, OR, XOR and NOT into an expression tree that is built once and
 * evaluated any number of times. AND/OR nodes flatten associatively and an
 * AND node can report which of its clauses failed.
 *
 * @module domain/specification/ISpecification
 * @see {@link https://martinfowler.com/apsupp/spec.pdf | Specification Pattern}
 */

import { InvalidCompositionError, UnimplementedOperationError } from '../exceptions';

/**
 * ISpecification - Core specification interface.
 *
 * A Specification is a predicate that determines if a candidate satisfies
 * certain criteria.
 *
 * @template T - The type of candidate this specification applies to
 *
 * @remarks
 * Trees have two phases:
 * - **Construction**: `and`/`or` on an unsealed AND/OR node append to that
 *   node in place. Build the whole tree from a single owner.
 * - **Evaluation**: `isSatisfiedBy` and `remainderUnsatisfiedBy` never
 *   mutate the tree, so a finished tree can be shared freely.
 *
 * Sealing a tree (see `SpecificationBuilder.build`) ends the construction
 * phase: combining a sealed node allocates a new one instead.
 *
 * @example
 * ```typescript
 * const eligible = new ITDepartment()
 *   .and(new SalaryGreaterThan(4))
 *   .and(new AdmissionTimeInYearsGreaterThan(3));
 *
 * eligible.isSatisfiedBy(candidate);          // true or false
 * eligible.remainderUnsatisfiedBy(candidate); // null, or what failed
 * ```
 */
export interface ISpecification<T> {
  /**
   * Check if the candidate satisfies this specification.
   */
  isSatisfiedBy(candidate: T): boolean;

  /**
   * Describe what the candidate failed.
   *
   * @returns null when satisfied; otherwise the sub-specification that
   * explains the failure (the node itself unless a variant narrows it)
   */
  remainderUnsatisfiedBy(candidate: T): ISpecification<T> | null;

  /**
   * Combine with another specification using logical AND.
   *
   * @returns An AND node; may be this node, extended in place
   */
  and(other: ISpecification<T>): ISpecification<T>;

  /**
   * Combine with another specification using logical OR.
   *
   * @returns An OR node; may be this node, extended in place
   */
  or(other: ISpecification<T>): ISpecification<T>;

  /**
   * Combine with another specification using exclusive OR.
   * Always allocates a new node.
   */
  xor(other: ISpecification<T>): ISpecification<T>;

  /**
   * Negate this specification. Always allocates a new node.
   */
  not(): ISpecification<T>;

  /**
   * Traverse this node with a visitor.
   */
  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult;

  /** Whether construction of this node has finished */
  readonly sealed: boolean;

  /**
   * Mark this node (and every node below it) as finished.
   */
  seal(): this;
}

/**
 * Specification visitor interface.
 *
 * Implements the Visitor pattern to traverse specification trees, for
 * example to render or translate them.
 *
 * @template T - The candidate type
 * @template TResult - The result type produced by the visitor
 *
 * @example
 * ```typescript
 * class LeafCounter implements ISpecificationVisitor<Candidate, number> {
 *   visitAnd(children: number[]) { return children.reduce((a, b) => a + b, 0); }
 *   visitOr(children: number[]) { return children.reduce((a, b) => a + b, 0); }
 *   visitXor(left: number, right: number) { return left + right; }
 *   visitNot(inner: number) { return inner; }
 *   visitTrue() { return 0; }
 *   visitFalse() { return 0; }
 *   visitLeaf() { return 1; }
 * }
 * ```
 */
export interface ISpecificationVisitor<T, TResult> {
  visitAnd(children: TResult[], specification: AndSpecification<T>): TResult;
  visitOr(children: TResult[], specification: OrSpecification<T>): TResult;
  visitXor(left: TResult, right: TResult, specification: XorSpecification<T>): TResult;
  visitNot(inner: TResult, specification: NotSpecification<T>): TResult;
  visitTrue(specification: TrueSpecification<T>): TResult;
  visitFalse(specification: FalseSpecification<T>): TResult;
  visitLeaf(specification: ISpecification<T>): TResult;
}

/**
 * Abstract base class for specifications with default combinator implementations.
 *
 * Subclasses only need to implement `isSatisfiedBy`. Leaves may override
 * `describeParameters` to show their rule parameters in `toString()`.
 *
 * @example
 * ```typescript
 * class MinimumTenure extends SpecificationBase<Employee> {
 *   constructor(private readonly years: number) {
 *     super();
 *   }
 *
 *   isSatisfiedBy(employee: Employee): boolean {
 *     return employee.tenure >= this.years;
 *   }
 *
 *   protected describeParameters(): string {
 *     return `years=${this.years}`;
 *   }
 * }
 * ```
 */
export abstract class SpecificationBase<T> implements ISpecification<T> {
  private _sealed = false;

  get sealed(): boolean {
    return this._sealed;
  }

  /**
   * Check if the candidate satisfies this specification.
   * Subclasses must override it.
   *
   * @throws UnimplementedOperationError when not overridden
   */
  isSatisfiedBy(_candidate: T): boolean {
    throw new UnimplementedOperationError(this.constructor.name, 'isSatisfiedBy');
  }

  remainderUnsatisfiedBy(candidate: T): ISpecification<T> | null {
    return this.isSatisfiedBy(candidate) ? null : this;
  }

  and(other: ISpecification<T>): ISpecification<T> {
    return new AndSpecification<T>(this, other);
  }

  or(other: ISpecification<T>): ISpecification<T> {
    return new OrSpecification<T>(this, other);
  }

  xor(other: ISpecification<T>): ISpecification<T> {
    return new XorSpecification<T>(this, other);
  }

  not(): ISpecification<T> {
    return new NotSpecification<T>(this);
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitLeaf(this);
  }

  seal(): this {
    this._sealed = true;
    return this;
  }

  /**
   * Rule parameters rendered inside the parentheses of `toString()`.
   */
  protected describeParameters(): string {
    return '';
  }

  toString(): string {
    return `${this.constructor.name}(${this.describeParameters()})`;
  }
}

/**
 * Base class for AND/OR nodes holding an ordered child list.
 *
 * @template T - The type of candidate
 */
export abstract class MultaryCompositeSpecification<T> extends SpecificationBase<T> {
  protected readonly children: ISpecification<T>[];

  constructor(...specifications: ISpecification<T>[]) {
    super();
    this.children = [...specifications];
  }

  /**
   * Child specifications, in composition order.
   */
  get specifications(): readonly ISpecification<T>[] {
    return this.children;
  }

  seal(): this {
    for (const child of this.children) {
      child.seal();
    }
    return super.seal();
  }

  toString(): string {
    return describeSpecification(this);
  }

  protected assertNotEmpty(): void {
    if (this.children.length === 0) {
      throw new InvalidCompositionError(
        `${this.constructor.name} has no child specifications`,
      );
    }
  }
}

/**
 * AND composite specification.
 *
 * Satisfied only if every child is satisfied.
 *
 * @template T - The type of candidate
 *
 * @example
 * ```typescript
 * const andSpec = new AndSpecification(specA, specB, specC);
 *
 * andSpec.and(specD);                        // appends specD, returns andSpec
 * andSpec.remainderUnsatisfiedBy(candidate); // only the failing children
 * ```
 */
export class AndSpecification<T> extends MultaryCompositeSpecification<T> {
  /**
   * Append `other` to this node (its children, when it is an AND too).
   * A sealed node is left untouched and a new flattened AND is returned.
   */
  and(other: ISpecification<T>): ISpecification<T> {
    const appended = other instanceof AndSpecification ? [...other.specifications] : [other];

    if (this.sealed) {
      return new AndSpecification<T>(...this.children, ...appended);
    }

    this.children.push(...appended);
    return this;
  }

  isSatisfiedBy(candidate: T): boolean {
    this.assertNotEmpty();
    return this.children.every((specification) => specification.isSatisfiedBy(candidate));
  }

  /**
   * Narrow the failure down to the unsatisfied children.
   *
   * @returns null if all children pass; the single failing child; this node
   * when every child fails; otherwise a new AND of the failing children
   */
  remainderUnsatisfiedBy(candidate: T): ISpecification<T> | null {
    this.assertNotEmpty();

    const unsatisfied = this.children.filter(
      (specification) => !specification.isSatisfiedBy(candidate),
    );
    const [first, ...rest] = unsatisfied;

    if (first === undefined) {
      return null;
    }
    if (rest.length === 0) {
      return first;
    }
    if (unsatisfied.length === this.children.length) {
      return this;
    }
    return new AndSpecification<T>(...unsatisfied);
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitAnd(
      this.children.map((child) => child.accept(visitor)),
      this,
    );
  }
}

/**
 * OR composite specification.
 *
 * Satisfied if at least one child is satisfied.
 *
 * @template T - The type of candidate
 */
export class OrSpecification<T> extends MultaryCompositeSpecification<T> {
  /**
   * Append `other` to this node (its children, when it is an OR too).
   * A sealed node is left untouched and a new flattened OR is returned.
   */
  or(other: ISpecification<T>): ISpecification<T> {
    const appended = other instanceof OrSpecification ? [...other.specifications] : [other];

    if (this.sealed) {
      return new OrSpecification<T>(...this.children, ...appended);
    }

    this.children.push(...appended);
    return this;
  }

  isSatisfiedBy(candidate: T): boolean {
    this.assertNotEmpty();
    return this.children.some((specification) => specification.isSatisfiedBy(candidate));
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitOr(
      this.children.map((child) => child.accept(visitor)),
      this,
    );
  }
}

/**
 * XOR composite specification.
 *
 * Satisfied if exactly one of the two operands is satisfied.
 *
 * @template T - The type of candidate
 */
export class XorSpecification<T> extends SpecificationBase<T> {
  constructor(
    readonly left: ISpecification<T>,
    readonly right: ISpecification<T>,
  ) {
    super();
  }

  isSatisfiedBy(candidate: T): boolean {
    return this.left.isSatisfiedBy(candidate) !== this.right.isSatisfiedBy(candidate);
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitXor(this.left.accept(visitor), this.right.accept(visitor), this);
  }

  seal(): this {
    this.left.seal();
    this.right.seal();
    return super.seal();
  }

  toString(): string {
    return describeSpecification(this);
  }
}

/**
 * NOT specification decorator.
 *
 * Satisfied only if the wrapped specification is NOT satisfied.
 *
 * @template T - The type of candidate
 */
export class NotSpecification<T> extends SpecificationBase<T> {
  constructor(readonly wrapped: ISpecification<T>) {
    super();
  }

  isSatisfiedBy(candidate: T): boolean {
    return !this.wrapped.isSatisfiedBy(candidate);
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitNot(this.wrapped.accept(visitor), this);
  }

  seal(): this {
    this.wrapped.seal();
    return super.seal();
  }

  toString(): string {
    return describeSpecification(this);
  }
}

/**
 * Specification satisfied by every candidate. Identity of AND.
 */
export class TrueSpecification<T> extends SpecificationBase<T> {
  isSatisfiedBy(_candidate: T): boolean {
    return true;
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitTrue(this);
  }
}

/**
 * Specification satisfied by no candidate. Identity of OR.
 */
export class FalseSpecification<T> extends SpecificationBase<T> {
  isSatisfiedBy(_candidate: T): boolean {
    return false;
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitFalse(this);
  }
}

/**
 * Predicate-based specification for functional creation.
 *
 * @internal
 */
class PredicateSpecification<T> extends SpecificationBase<T> {
  constructor(private readonly predicate: (candidate: T) => boolean) {
    super();
  }

  isSatisfiedBy(candidate: T): boolean {
    return this.predicate(candidate);
  }

  protected describeParameters(): string {
    return this.predicate.name;
  }
}

/**
 * Rendered node plus whether it needs parentheses when nested.
 */
interface Rendered {
  text: string;
  compound: boolean;
}

function group(rendered: Rendered): string {
  return rendered.compound ? `(${rendered.text})` : rendered.text;
}

class DescriptionVisitor<T> implements ISpecificationVisitor<T, Rendered> {
  visitAnd(children: Rendered[]): Rendered {
    return { text: children.map(group).join(' And '), compound: children.length > 1 };
  }

  visitOr(children: Rendered[]): Rendered {
    return { text: children.map(group).join(' Or '), compound: children.length > 1 };
  }

  visitXor(left: Rendered, right: Rendered): Rendered {
    return { text: `${group(left)} Xor ${group(right)}`, compound: true };
  }

  visitNot(inner: Rendered): Rendered {
    return { text: `Not(${inner.text})`, compound: false };
  }

  visitTrue(): Rendered {
    return { text: 'True', compound: false };
  }

  visitFalse(): Rendered {
    return { text: 'False', compound: false };
  }

  visitLeaf(specification: ISpecification<T>): Rendered {
    return { text: String(specification), compound: false };
  }
}

/**
 * Render a specification tree as text.
 *
 * @example
 * ```typescript
 * describeSpecification(new ITDepartment().and(new SalaryGreaterThan(4)));
 * // 'ITDepartment() And SalaryGreaterThan(threshold=4)'
 * ```
 */
export function describeSpecification<T>(specification: ISpecification<T>): string {
  return specification.accept(new DescriptionVisitor<T>()).text;
}

/**
 * Factory functions for creating and combining specifications.
 *
 * `and`, `or`, `xor` and `not` follow the same rules as the methods of
 * the same name.
 *
 * @example
 * ```typescript
 * const eligible = Specifications.and<Candidate>(
 *   new ITDepartment(),
 *   new SalaryGreaterThan(4),
 *   new AdmissionTimeInYearsGreaterThan(3),
 * );
 * ```
 */
export const Specifications = {
  /**
   * Create a specification from a predicate function.
   */
  where<T>(predicate: (candidate: T) => boolean): ISpecification<T> {
    return new PredicateSpecification(predicate);
  },

  /**
   * Specification that matches every candidate.
   */
  all<T>(): ISpecification<T> {
    return new TrueSpecification<T>();
  },

  /**
   * Specification that matches no candidate.
   */
  none<T>(): ISpecification<T> {
    return new FalseSpecification<T>();
  },

  /**
   * Combine specifications with AND, left to right.
   * An empty list yields a TRUE specification.
   */
  and<T>(...specs: ISpecification<T>[]): ISpecification<T> {
    const [first, ...rest] = specs;
    if (first === undefined) {
      return new TrueSpecification<T>();
    }
    return rest.reduce((acc, spec) => acc.and(spec), first);
  },

  /**
   * Combine specifications with OR, left to right.
   * An empty list yields a FALSE specification.
   */
  or<T>(...specs: ISpecification<T>[]): ISpecification<T> {
    const [first, ...rest] = specs;
    if (first === undefined) {
      return new FalseSpecification<T>();
    }
    return rest.reduce((acc, spec) => acc.or(spec), first);
  },

  xor<T>(left: ISpecification<T>, right: ISpecification<T>): ISpecification<T> {
    return left.xor(right);
  },

  not<T>(specification: ISpecification<T>): ISpecification<T> {
    return specification.not();
  },
};
