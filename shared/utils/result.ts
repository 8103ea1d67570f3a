/**
 * @file Result Type - Error Handling Without Exceptions
 * @description Result<T, E> type used where a failure is expected and recoverable
 * (per-row validation), so callers branch instead of catching.
 * @depends None (pure type definitions and utility functions)
 *
 * @example
 * function readThrust(row: CsvRecord): Result<number, RowValidationError> {
 *   const value = parseNumber(row.thrust_N);
 *   if (value === null) {
 *     return err(new RowValidationError(row.line, ['thrust_N']));
 *   }
 *   return ok(value);
 * }
 */

// ====== Core Type Definitions ======

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

// ====== Constructors ======

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ====== Utility Functions ======

/**
 * Split a list of results into accepted values and collected errors, keeping input order
 */
export function partition<T, E>(results: Iterable<Result<T, E>>): { values: T[]; errors: E[] } {
  const values: T[] = [];
  const errors: E[] = [];
  for (const result of results) {
    if (result.ok) {
      values.push(result.value);
    } else {
      errors.push(result.error);
    }
  }
  return { values, errors };
}
