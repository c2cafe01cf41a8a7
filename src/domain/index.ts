/**
 * @module domain
 * @description Domain layer exports
 */

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';

// ============================================================================
// Candidate Accessor
// ============================================================================

export * from './candidate';

// ============================================================================
// Specification Pattern
// ============================================================================

export * from './specification';

// ============================================================================
// Eligibility Rules
// ============================================================================

export * from './eligibility';
