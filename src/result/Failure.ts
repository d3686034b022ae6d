/**
 * Failure variant of ResultValue<T, E>.
 *
 * @module result
 */

import type { MatchHandlers, ResultMethods, ResultValue } from '../types/result';
import type { AcceptsDefault, TypeToken } from '../utils/defaults';
import type { Success } from './Success';
import { UnwrapOnFailureError } from '../errors';
import { defaultFor } from '../utils/defaults';
import { combineHash, hashString, payloadEquals, payloadHash } from '../utils/equality';
import { renderPayload } from '../utils/render';

const FAILURE_TAG = hashString('Failure');

/**
 * A ResultValue holding an error value.
 *
 * Instances are frozen on construction. Combinators that change the success
 * type re-wrap the same error value in a new Failure.
 */
export class Failure<T, E> implements ResultMethods<T, E> {
  readonly ok = false as const;

  constructor(readonly error: E) {
    Object.freeze(this);
  }

  isSuccess(): this is Success<T, E> {
    return false;
  }

  isFailure(): this is Failure<T, E> {
    return true;
  }

  isSuccessAnd(_predicate: (value: T) => boolean): boolean {
    return false;
  }

  isFailureAnd(predicate: (error: E) => boolean): boolean {
    return predicate(this.error);
  }

  successOrNone(): T | null {
    return null;
  }

  failureOrNone(): E | null {
    return this.error;
  }

  map<U>(_f: (value: T) => U): ResultValue<U, E> {
    return new Failure<U, E>(this.error);
  }

  mapError<F>(f: (error: E) => F): ResultValue<T, F> {
    return new Failure<T, F>(f(this.error));
  }

  mapOr<U>(defaultValue: U, _f: (value: T) => U): U {
    return defaultValue;
  }

  mapOrElse<U>(onError: (error: E) => U, _onSuccess: (value: T) => U): U {
    return onError(this.error);
  }

  match<U>(handlers: MatchHandlers<T, E, U>): U {
    return handlers.failure(this.error);
  }

  inspect(_f: (value: T) => void): ResultValue<T, E> {
    return this;
  }

  inspectError(f: (error: E) => void): ResultValue<T, E> {
    f(this.error);
    return this;
  }

  toSequence(): Iterable<T> {
    return {
      *[Symbol.iterator]() {
        // nothing to yield
      },
    };
  }

  and<U>(_other: ResultValue<U, E>): ResultValue<U, E> {
    return new Failure<U, E>(this.error);
  }

  andThen<U>(_f: (value: T) => ResultValue<U, E>): ResultValue<U, E> {
    return new Failure<U, E>(this.error);
  }

  or<F>(other: ResultValue<T, F>): ResultValue<T, F> {
    return other;
  }

  orElse<F>(f: (error: E) => ResultValue<T, F>): ResultValue<T, F> {
    return f(this.error);
  }

  flatten<U>(this: ResultValue<ResultValue<U, E>, E>): ResultValue<U, E> {
    return this.andThen((inner) => inner);
  }

  unwrap(): T {
    throw new UnwrapOnFailureError('called `unwrap` on a `Failure` value', this.error);
  }

  unwrapError(): E {
    return this.error;
  }

  expect(message: string): T {
    throw new UnwrapOnFailureError(message, this.error);
  }

  expectFailure(_message: string): E {
    return this.error;
  }

  unwrapOr(defaultValue: T): T {
    return defaultValue;
  }

  unwrapOrElse(f: (error: E) => T): T {
    return f(this.error);
  }

  unwrapOrDefault<C extends TypeToken>(type: C & AcceptsDefault<C, T>): T {
    return defaultFor<C, T>(type);
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    return other instanceof Failure && payloadEquals(this.error, other.error);
  }

  hashCode(): number {
    return combineHash(FAILURE_TAG, payloadHash(this.error));
  }

  toString(): string {
    return `Failure(${renderPayload(this.error)})`;
  }
}
