/**
 * ResultValue<T, E> type for functional error handling without exceptions.
 *
 * A ResultValue is either:
 * - Success: contains a success value of type T
 * - Failure: contains an error value of type E
 *
 * Both variants carry the full combinator set, so a ResultValue can be
 * transformed and chained without first checking which variant it is.
 * The `ok` flag discriminates the union for pattern matching.
 *
 * @example
 * ```typescript
 * function divide(a: number, b: number): ResultValue<number, string> {
 *   if (b === 0) {
 *     return failure("Division by zero");
 *   }
 *   return success(a / b);
 * }
 *
 * const halved = divide(10, 2).map((n) => n / 2).unwrapOr(0); // 2.5
 * ```
 */

import type { Success } from '../result/Success';
import type { Failure } from '../result/Failure';
import type { AcceptsDefault, TypeToken } from '../utils/defaults';

/**
 * Named branches for {@link ResultMethods.match}.
 */
export interface MatchHandlers<T, E, U> {
  readonly success: (value: T) => U;
  readonly failure: (error: E) => U;
}

/**
 * Operations shared by both variants of ResultValue<T, E>.
 *
 * Every operation is pure apart from the closures the caller passes in.
 * Only the extraction methods `unwrap`, `unwrapError`, `expect`,
 * `expectFailure` and `unwrapOrDefault` can throw; everything else is total.
 */
export interface ResultMethods<T, E> {
  /**
   * Returns true if the result is a Success.
   *
   * @example
   * ```typescript
   * const result = parseVersion(2);
   * if (result.isSuccess()) {
   *   console.log(result.value); // narrowed to Success
   * }
   * ```
   */
  isSuccess(): this is Success<T, E>;

  /**
   * Returns true if the result is a Failure.
   */
  isFailure(): this is Failure<T, E>;

  /**
   * Returns true if the result is a Success and its value satisfies the predicate.
   *
   * The predicate is never called on a Failure.
   */
  isSuccessAnd(predicate: (value: T) => boolean): boolean;

  /**
   * Returns true if the result is a Failure and its error satisfies the predicate.
   *
   * The predicate is never called on a Success.
   */
  isFailureAnd(predicate: (error: E) => boolean): boolean;

  /**
   * Converts to the success value, discarding the error.
   *
   * @returns The success value, or null for a Failure
   */
  successOrNone(): T | null;

  /**
   * Converts to the error value, discarding the success value.
   *
   * @returns The error value, or null for a Success
   */
  failureOrNone(): E | null;

  /**
   * Maps a ResultValue<T, E> to ResultValue<U, E> by applying `f` to a
   * contained success value, leaving a Failure untouched.
   *
   * @example
   * ```typescript
   * success(2).map((n) => n * 10); // Success(20)
   * failure("bad").map((n: number) => n * 10); // Failure("bad")
   * ```
   */
  map<U>(f: (value: T) => U): ResultValue<U, E>;

  /**
   * Maps a ResultValue<T, E> to ResultValue<T, F> by applying `f` to a
   * contained error, leaving a Success untouched.
   *
   * Useful for translating low-level errors into domain errors.
   */
  mapError<F>(f: (error: E) => F): ResultValue<T, F>;

  /**
   * Returns `f` applied to the success value, or `defaultValue` for a Failure.
   *
   * `defaultValue` is evaluated eagerly by the caller. When computing it is
   * expensive, use {@link ResultMethods.mapOrElse} instead.
   */
  mapOr<U>(defaultValue: U, f: (value: T) => U): U;

  /**
   * Maps to U by applying `onError` to a Failure or `onSuccess` to a Success.
   *
   * Exactly one of the closures is called.
   *
   * @example
   * ```typescript
   * const label = parseVersion(3).mapOrElse(
   *   (error) => `unsupported: ${error}`,
   *   (version) => `version ${version}`
   * );
   * // label: "unsupported: invalid version"
   * ```
   */
  mapOrElse<U>(onError: (error: E) => U, onSuccess: (value: T) => U): U;

  /**
   * Folds the result into U with named branches. Exactly one handler is called.
   */
  match<U>(handlers: MatchHandlers<T, E, U>): U;

  /**
   * Calls `f` with the success value, if any, and returns this result unchanged.
   */
  inspect(f: (value: T) => void): ResultValue<T, E>;

  /**
   * Calls `f` with the error value, if any, and returns this result unchanged.
   */
  inspectError(f: (error: E) => void): ResultValue<T, E>;

  /**
   * Returns a lazy sequence over the possibly contained success value.
   *
   * The sequence yields the value once for a Success and nothing for a
   * Failure. It can be iterated any number of times.
   *
   * @example
   * ```typescript
   * [...success(1).toSequence()]; // [1]
   * [...failure("bad").toSequence()]; // []
   * ```
   */
  toSequence(): Iterable<T>;

  /**
   * Returns `other` if this is a Success, otherwise propagates this Failure's error.
   *
   * `other` is an already constructed value. Use
   * {@link ResultMethods.andThen} to compute it only on success.
   */
  and<U>(other: ResultValue<U, E>): ResultValue<U, E>;

  /**
   * Calls `f` with the success value and returns its result, otherwise
   * propagates this Failure's error without calling `f`.
   *
   * @example
   * ```typescript
   * parseVersionInput("2").andThen(loadSchemaFor);
   * ```
   */
  andThen<U>(f: (value: T) => ResultValue<U, E>): ResultValue<U, E>;

  /**
   * Returns this Success's value unchanged, otherwise returns `other`.
   *
   * `other` is an already constructed value. Use
   * {@link ResultMethods.orElse} to compute it only on failure.
   */
  or<F>(other: ResultValue<T, F>): ResultValue<T, F>;

  /**
   * Calls `f` with the error value and returns its result, otherwise returns
   * this Success's value unchanged without calling `f`.
   */
  orElse<F>(f: (error: E) => ResultValue<T, F>): ResultValue<T, F>;

  /**
   * Collapses one level of nesting: ResultValue<ResultValue<U, E>, E> to
   * ResultValue<U, E>.
   *
   * Only callable when the success type is itself a ResultValue with the
   * same error type.
   */
  flatten<U>(this: ResultValue<ResultValue<U, E>, E>): ResultValue<U, E>;

  /**
   * Returns the success value.
   *
   * Prefer {@link ResultMethods.unwrapOr} or {@link ResultMethods.unwrapOrElse},
   * or handle the Failure case explicitly.
   *
   * @throws {UnwrapOnFailureError} If the result is a Failure. The error
   *   carries the failure payload.
   */
  unwrap(): T;

  /**
   * Returns the error value.
   *
   * @throws {UnwrapOnSuccessError} If the result is a Success. The error
   *   carries the success payload.
   */
  unwrapError(): E;

  /**
   * Returns the success value, or throws with the given message.
   *
   * @param message - Diagnostic used as the error message prefix
   * @throws {UnwrapOnFailureError} If the result is a Failure
   */
  expect(message: string): T;

  /**
   * Returns the error value, or throws with the given message.
   *
   * @param message - Diagnostic used as the error message prefix
   * @throws {UnwrapOnSuccessError} If the result is a Success
   */
  expectFailure(message: string): E;

  /**
   * Returns the success value, or `defaultValue` for a Failure.
   */
  unwrapOr(defaultValue: T): T;

  /**
   * Returns the success value, or computes one from the error.
   */
  unwrapOrElse(f: (error: E) => T): T;

  /**
   * Returns the success value, or the canonical default of the given type.
   *
   * The type token names T at runtime (`Number`, `String`, `Map`, ...). A
   * whitelisted token whose default does not fit T is a compile error, e.g.
   * `Date` for a `ResultValue<string, E>`. A Success returns its value
   * without consulting the token.
   *
   * @example
   * ```typescript
   * const count: ResultValue<number, string> = failure("bad");
   * count.unwrapOrDefault(Number); // 0
   * ```
   *
   * @throws {UnsupportedDefaultTypeError} If the result is a Failure and the
   *   token has no known default
   */
  unwrapOrDefault<C extends TypeToken>(type: C & AcceptsDefault<C, T>): T;

  /**
   * Returns true if `other` is the same variant with an equal payload.
   *
   * Payloads that define `equals(other)` decide equality themselves;
   * everything else is compared with `Object.is`.
   */
  equals(other: unknown): boolean;

  /**
   * Hash combining the variant tag and the payload hash.
   *
   * Consistent with {@link ResultMethods.equals} whenever the payload's own
   * `equals` and `hashCode` are.
   */
  hashCode(): number;

  toString(): string;
}

/**
 * ResultValue type - either Success<T, E> or Failure<T, E>
 */
export type ResultValue<T, E> = Success<T, E> | Failure<T, E>;
