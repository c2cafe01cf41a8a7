/**
 * Eligibility - Candidate Accessor
 *
 * Read-only, typed view over the record under evaluation. Specifications
 * never touch the raw record directly; they go through the accessor so that
 * a missing key and an unparseable value surface as distinct errors.
 *
 * @module domain/candidate/ICandidate
 */

import { Decimal } from 'decimal.js';
import { isValid, parseISO } from 'date-fns';
import { MalformedValueError, MissingFieldError } from '../exceptions';

/**
 * Raw key/value record as supplied by a data source
 */
export type CandidateRecord = Readonly<Record<string, unknown>>;

/**
 * Error produced by a field lookup
 */
export type FieldError = MissingFieldError | MalformedValueError;

/**
 * Outcome of a typed field lookup
 *
 * @example
 * ```typescript
 * const result = candidate.readDecimal('salario_bruto');
 * if (result.ok) {
 *   console.log(result.value.toFixed(2));
 * } else {
 *   console.warn(result.error.message);
 * }
 * ```
 */
export type FieldResult<V> =
  | { readonly ok: true; readonly value: V }
  | { readonly ok: false; readonly error: FieldError };

/**
 * ICandidate - typed field access over one record.
 *
 * `read*` methods return a {@link FieldResult}; `get*` methods return the
 * value or throw the lookup error. Keys are case-sensitive.
 */
export interface ICandidate {
  /** Whether the key is present with a non-null value */
  has(key: string): boolean;

  readString(key: string): FieldResult<string>;
  readDecimal(key: string): FieldResult<Decimal>;
  readDate(key: string): FieldResult<Date>;

  getString(key: string): string;
  getDecimal(key: string): Decimal;
  getDate(key: string): Date;
}

/**
 * Anything a leaf specification accepts as input
 */
export type CandidateLike = ICandidate | CandidateRecord;

function ok<V>(value: V): FieldResult<V> {
  return { ok: true, value };
}

function fail(error: FieldError): { readonly ok: false; readonly error: FieldError } {
  return { ok: false, error };
}

function unwrap<V>(result: FieldResult<V>): V {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Parse a raw value as an exact decimal.
 * Accepts Decimal instances, finite numbers and numeric strings.
 */
export function parseDecimal(field: string, raw: unknown): FieldResult<Decimal> {
  if (Decimal.isDecimal(raw)) {
    return raw.isFinite() ? ok(raw) : fail(new MalformedValueError(field, raw, 'decimal'));
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw)
      ? ok(new Decimal(raw))
      : fail(new MalformedValueError(field, raw, 'decimal'));
  }

  if (typeof raw === 'string' && raw.trim() !== '') {
    try {
      const value = new Decimal(raw.trim());
      return value.isFinite() ? ok(value) : fail(new MalformedValueError(field, raw, 'decimal'));
    } catch {
      return fail(new MalformedValueError(field, raw, 'decimal'));
    }
  }

  return fail(new MalformedValueError(field, raw, 'decimal'));
}

/**
 * Parse a raw value as a calendar date.
 * Accepts valid Date instances and ISO-8601 strings.
 */
export function parseDate(field: string, raw: unknown): FieldResult<Date> {
  if (raw instanceof Date) {
    return isValid(raw) ? ok(new Date(raw.getTime())) : fail(new MalformedValueError(field, raw, 'date'));
  }

  if (typeof raw === 'string') {
    const parsed = parseISO(raw.trim());
    return isValid(parsed) ? ok(parsed) : fail(new MalformedValueError(field, raw, 'date'));
  }

  return fail(new MalformedValueError(field, raw, 'date'));
}

/**
 * Candidate - default {@link ICandidate} over a plain record.
 *
 * @example
 * ```typescript
 * const candidate = Candidate.from({
 *   area: 'Tecnologia',
 *   cargo: 'Analista',
 *   salario_bruto: '5225.00',
 *   data_de_admissao: '2019-01-01',
 * });
 *
 * candidate.getString('area');            // 'Tecnologia'
 * candidate.getDecimal('salario_bruto');  // Decimal(5225)
 * ```
 */
export class Candidate implements ICandidate {
  private readonly record: CandidateRecord;

  private constructor(record: CandidateRecord) {
    this.record = Object.freeze({ ...record });
  }

  /**
   * Wrap a record, or return the accessor unchanged if it already is one.
   */
  static from(source: CandidateLike): ICandidate {
    if (isCandidateAccessor(source)) {
      return source;
    }
    return new Candidate(source);
  }

  has(key: string): boolean {
    const value = this.record[key];
    return value !== undefined && value !== null;
  }

  readString(key: string): FieldResult<string> {
    const raw = this.record[key];
    if (raw === undefined || raw === null) {
      return fail(new MissingFieldError(key));
    }
    return typeof raw === 'string' ? ok(raw) : fail(new MalformedValueError(key, raw, 'string'));
  }

  readDecimal(key: string): FieldResult<Decimal> {
    const raw = this.record[key];
    if (raw === undefined || raw === null) {
      return fail(new MissingFieldError(key));
    }
    return parseDecimal(key, raw);
  }

  readDate(key: string): FieldResult<Date> {
    const raw = this.record[key];
    if (raw === undefined || raw === null) {
      return fail(new MissingFieldError(key));
    }
    return parseDate(key, raw);
  }

  getString(key: string): string {
    return unwrap(this.readString(key));
  }

  getDecimal(key: string): Decimal {
    return unwrap(this.readDecimal(key));
  }

  getDate(key: string): Date {
    return unwrap(this.readDate(key));
  }
}

function isCandidateAccessor(source: CandidateLike): source is ICandidate {
  return (
    typeof source.readString === 'function' &&
    typeof source.readDecimal === 'function' &&
    typeof source.readDate === 'function' &&
    typeof source.getString === 'function'
  );
}
