/**
 * @module application
 * @description Application layer exports: evaluation, configuration, logging
 */

// ============================================================================
// Evaluation
// ============================================================================

export * from './evaluation';

// ============================================================================
// Configuration
// ============================================================================

export * from './config';

// ============================================================================
// Logging
// ============================================================================

export * from './logging';
