/**
 * Helper functions for creating and combining ResultValue<T, E> values.
 *
 * @module result
 */

import type { SafeParseReturnType, ZodError } from 'zod';
import type { ResultValue } from '../types/result';
import { Success } from '../result/Success';
import { Failure } from '../result/Failure';

/**
 * Create a successful ResultValue containing a value.
 *
 * @param value - The success value
 * @returns Success<T, E> result
 *
 * @example
 * ```typescript
 * const result = success(42);
 * // result: { ok: true, value: 42 }
 * ```
 */
export function success<T, E = never>(value: T): ResultValue<T, E> {
  return new Success<T, E>(value);
}

/**
 * Create a failed ResultValue containing an error.
 *
 * @param error - The error value
 * @returns Failure<T, E> result
 *
 * @example
 * ```typescript
 * const result = failure("Something went wrong");
 * // result: { ok: false, error: "Something went wrong" }
 * ```
 */
export function failure<T = never, E = unknown>(error: E): ResultValue<T, E> {
  return new Failure<T, E>(error);
}

/**
 * Type guard to check if a ResultValue is a Success.
 *
 * @example
 * ```typescript
 * const results = [success(1), failure("bad"), success(3)];
 * const values = results.filter(isSuccess).map((r) => r.value); // [1, 3]
 * ```
 */
export function isSuccess<T, E>(result: ResultValue<T, E>): result is Success<T, E> {
  return result.ok === true;
}

/**
 * Type guard to check if a ResultValue is a Failure.
 */
export function isFailure<T, E>(result: ResultValue<T, E>): result is Failure<T, E> {
  return result.ok === false;
}

/**
 * Collapse ResultValue<ResultValue<T, E>, E> into ResultValue<T, E>.
 *
 * Function form of the `flatten()` method, handy in `map` pipelines.
 */
export function flatten<T, E>(result: ResultValue<ResultValue<T, E>, E>): ResultValue<T, E> {
  return result.andThen((inner) => inner);
}

/**
 * Wrap a synchronous function call in a ResultValue, catching any thrown errors.
 *
 * Non-Error throwables are wrapped in an Error carrying their string form.
 *
 * @example
 * ```typescript
 * const parsed = tryCatch((): unknown => JSON.parse(raw));
 * ```
 */
export function tryCatch<T>(fn: () => T): ResultValue<T, Error> {
  try {
    return success(fn());
  } catch (e) {
    return failure(e instanceof Error ? e : new Error(String(e)));
  }
}

/**
 * Success for any value other than null or undefined, else a Failure
 * carrying `error`.
 */
export function fromNullable<T, E>(value: T | null | undefined, error: E): ResultValue<T, E> {
  return value === null || value === undefined ? failure(error) : success(value);
}

/**
 * Convert a zod `safeParse` outcome into a ResultValue.
 *
 * @example
 * ```typescript
 * const port = fromSafeParse(z.coerce.number().int().safeParse(raw));
 * ```
 */
export function fromSafeParse<I, O>(
  parsed: SafeParseReturnType<I, O>,
): ResultValue<O, ZodError<I>> {
  return parsed.success ? success(parsed.data) : failure(parsed.error);
}

/**
 * Turn a list of results into a result of a list.
 *
 * Returns the first Failure encountered, or a Success with every value in order.
 */
export function collect<T, E>(results: Iterable<ResultValue<T, E>>): ResultValue<T[], E> {
  const values: T[] = [];
  for (const result of results) {
    if (!result.ok) {
      return failure(result.error);
    }
    values.push(result.value);
  }
  return success(values);
}

/**
 * Split results into success values and error values, preserving order.
 */
export function partition<T, E>(
  results: Iterable<ResultValue<T, E>>,
): { successes: T[]; failures: E[] } {
  const successes: T[] = [];
  const failures: E[] = [];
  for (const result of results) {
    if (result.ok) {
      successes.push(result.value);
    } else {
      failures.push(result.error);
    }
  }
  return { successes, failures };
}
