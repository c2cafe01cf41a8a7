/**
 * @fileoverview Domain Specification Pattern Exports
 * @description
 * This module exports the specification algebra used to express
 * eligibility rules.
 *
 * The Specification pattern allows you to:
 * - Encapsulate business rules as reusable, testable objects
 * - Compose complex rules using AND, OR, XOR, NOT operators
 * - Report which clauses of a failed AND rule were not met
 *
 * @packageDocumentation
 * @module domain/specification
 *
 * @see {@link https://martinfowler.com/apsupp/spec.pdf | Martin Fowler - Specification Pattern}
 */

// Core Specification Classes
export {
  // Base classes for implementation
  SpecificationBase,
  MultaryCompositeSpecification,

  // Composites
  AndSpecification,
  OrSpecification,
  XorSpecification,
  NotSpecification,

  // Constants
  TrueSpecification,
  FalseSpecification,

  // Factory utilities
  Specifications,
  describeSpecification,
} from './ISpecification';

export type {
  // Main interface
  ISpecification,

  // Visitor pattern for traversal
  ISpecificationVisitor,
} from './ISpecification';

// Builder
export { SpecificationBuilder } from './builder';
