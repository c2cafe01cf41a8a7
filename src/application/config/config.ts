/**
 * Eligibility - Configuration
 *
 * Settings read from environment variables. Unset variables fall back to
 * defaults; invalid values fail fast with the variable name in the error.
 */

import type { Decimal } from 'decimal.js';
import { DEFAULT_BASE_SALARY, SalaryNormalizer, freezeReferenceTime } from '../../domain/eligibility';
import { MalformedValueError } from '../../domain/exceptions';
import { createLogger, isLogLevel, type ILogger, type LogLevel } from '../logging';

/**
 * Environment variable names
 */
export const ConfigKeys = {
  BASE_SALARY: 'PROFIT_SHARING_BASE_SALARY',
  REFERENCE_TIME: 'PROFIT_SHARING_REFERENCE_TIME',
  LOG_LEVEL: 'PROFIT_SHARING_LOG_LEVEL',
} as const;

/**
 * Resolved configuration
 */
export interface EligibilityConfig {
  /** Environment (development, production, test) */
  environment: string;

  /** Base salary for salary-ratio rules */
  baseSalary: Decimal;

  /** Normalizer built from `baseSalary` */
  normalizer: SalaryNormalizer;

  /** Fixed reference time for tenure rules; undefined means "now" at rule construction */
  referenceTime?: Date;

  logLevel: LogLevel;

  /** Logger filtered at `logLevel` */
  logger: ILogger;
}

function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function wrapAs<V>(key: string, build: () => V): V {
  try {
    return build();
  } catch (error) {
    if (error instanceof MalformedValueError) {
      throw new MalformedValueError(key, error.value, 'configuration value');
    }
    throw error;
  }
}

/**
 * Load configuration from environment variables.
 *
 * @example
 * ```typescript
 * const config = loadEligibilityConfig({
 *   PROFIT_SHARING_BASE_SALARY: '1100.00',
 *   PROFIT_SHARING_REFERENCE_TIME: '2024-01-01',
 * });
 *
 * const rule = new SalaryGreaterThan(4, config.normalizer);
 * ```
 */
export function loadEligibilityConfig(env: NodeJS.ProcessEnv = process.env): EligibilityConfig {
  const environment = read(env, 'NODE_ENV') ?? 'development';

  const rawBase = read(env, ConfigKeys.BASE_SALARY);
  const normalizer = wrapAs(ConfigKeys.BASE_SALARY, () =>
    new SalaryNormalizer(rawBase ?? DEFAULT_BASE_SALARY),
  );

  const rawReference = read(env, ConfigKeys.REFERENCE_TIME);
  const referenceTime =
    rawReference === undefined
      ? undefined
      : wrapAs(ConfigKeys.REFERENCE_TIME, () => freezeReferenceTime(rawReference));

  const rawLevel = read(env, ConfigKeys.LOG_LEVEL)?.toLowerCase();
  let logLevel: LogLevel;
  if (rawLevel === undefined) {
    logLevel = environment === 'test' ? 'silent' : 'info';
  } else if (isLogLevel(rawLevel)) {
    logLevel = rawLevel;
  } else {
    throw new MalformedValueError(ConfigKeys.LOG_LEVEL, rawLevel, 'log level');
  }

  return {
    environment,
    baseSalary: normalizer.base,
    normalizer,
    referenceTime,
    logLevel,
    logger: createLogger(logLevel),
  };
}
