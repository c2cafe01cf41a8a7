/**
 * Eligibility - Specification Evaluator
 *
 * Runs a specification tree against candidates and reports, for each one,
 * whether it was satisfied and which clauses failed.
 */

import {
  AndSpecification,
  type ISpecification,
} from '../../domain/specification';
import { isSpecificationError } from '../../domain/exceptions';
import { consoleLogger, type ILogger } from '../logging';

/**
 * Specification evaluation options.
 *
 * @example
 * ```typescript
 * const options: SpecificationEvaluationOptions = {
 *   throwOnError: false,
 *   defaultOnError: false,
 *   logger: createLogger('warn'),
 * };
 * ```
 */
export interface SpecificationEvaluationOptions {
  /**
   * Whether to re-throw errors raised during evaluation
   * (missing or malformed fields, invalid trees).
   * When false, the result carries the error and `defaultOnError`.
   * @defaultValue true
   */
  throwOnError?: boolean;

  /**
   * Value reported as `satisfied` when an error is not re-thrown.
   * @defaultValue false
   */
  defaultOnError?: boolean;

  /**
   * Logger for evaluation diagnostics.
   * @defaultValue consoleLogger
   */
  logger?: ILogger;
}

/**
 * A clause the candidate did not satisfy
 */
export interface FailedSpecification<T> {
  specification: ISpecification<T>;
  reason: string;
}

/**
 * Specification evaluation result with details.
 *
 * @template T - The candidate type
 *
 * @example
 * ```typescript
 * const result = evaluator.evaluate(rule, candidate);
 *
 * if (!result.satisfied) {
 *   result.failedSpecifications.forEach(({ reason }) => console.log(`- ${reason}`));
 * }
 * ```
 */
export interface SpecificationEvaluationResult<T> {
  /** Whether the candidate satisfied the specification */
  satisfied: boolean;

  /** The candidate that was evaluated */
  candidate: T;

  /** `remainderUnsatisfiedBy` of the evaluated tree; null when satisfied */
  remainder: ISpecification<T> | null;

  /** Failed clauses: the children of an AND remainder, otherwise the remainder itself */
  failedSpecifications: FailedSpecification<T>[];

  /** Error raised during evaluation, when not re-thrown */
  error?: Error;

  /** Evaluation duration in milliseconds */
  duration: number;
}

function toFailures<T>(remainder: ISpecification<T> | null): FailedSpecification<T>[] {
  if (remainder === null) {
    return [];
  }
  const clauses = remainder instanceof AndSpecification ? remainder.specifications : [remainder];
  return clauses.map((specification) => ({ specification, reason: String(specification) }));
}

/**
 * SpecificationEvaluator - evaluates trees with error policy and logging.
 *
 * @example
 * ```typescript
 * const evaluator = new SpecificationEvaluator<CandidateLike>({ logger: config.logger });
 * const results = evaluator.evaluateAll(rule, employees);
 * const eligible = results.filter((r) => r.satisfied).map((r) => r.candidate);
 * ```
 */
export class SpecificationEvaluator<T> {
  private readonly throwOnError: boolean;
  private readonly defaultOnError: boolean;
  private readonly logger: ILogger;

  constructor(options: SpecificationEvaluationOptions = {}) {
    this.throwOnError = options.throwOnError ?? true;
    this.defaultOnError = options.defaultOnError ?? false;
    this.logger = options.logger ?? consoleLogger;
  }

  evaluate(specification: ISpecification<T>, candidate: T): SpecificationEvaluationResult<T> {
    const startTime = Date.now();

    try {
      const satisfied = specification.isSatisfiedBy(candidate);
      const remainder = satisfied ? null : specification.remainderUnsatisfiedBy(candidate);
      const duration = Date.now() - startTime;

      this.logger.debug(`Evaluated ${String(specification)}: ${satisfied ? 'satisfied' : 'not satisfied'}`, {
        remainder: remainder === null ? null : String(remainder),
        duration,
      });

      return {
        satisfied,
        candidate,
        remainder,
        failedSpecifications: toFailures(remainder),
        duration,
      };
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      const context = isSpecificationError(error) ? { code: error.code } : { name: error.name };

      if (this.throwOnError) {
        this.logger.error(`Evaluation of ${String(specification)} failed: ${error.message}`, context);
        throw error;
      }

      this.logger.warn(
        `Evaluation of ${String(specification)} failed, reporting ${String(this.defaultOnError)}: ${error.message}`,
        context,
      );

      return {
        satisfied: this.defaultOnError,
        candidate,
        remainder: this.defaultOnError ? null : specification,
        failedSpecifications: this.defaultOnError
          ? []
          : [{ specification, reason: error.message }],
        error,
        duration: Date.now() - startTime,
      };
    }
  }

  evaluateAll(specification: ISpecification<T>, candidates: Iterable<T>): SpecificationEvaluationResult<T>[] {
    const results: SpecificationEvaluationResult<T>[] = [];
    for (const candidate of candidates) {
      results.push(this.evaluate(specification, candidate));
    }
    return results;
  }
}
