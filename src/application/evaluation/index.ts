/**
 * @module application/evaluation
 */

export { SpecificationEvaluator } from './evaluator';

export type {
  SpecificationEvaluationOptions,
  SpecificationEvaluationResult,
  FailedSpecification,
} from './evaluator';
