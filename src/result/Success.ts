/**
 * Success variant of ResultValue<T, E>.
 *
 * @module result
 */

import type { MatchHandlers, ResultMethods, ResultValue } from '../types/result';
import type { AcceptsDefault, TypeToken } from '../utils/defaults';
import type { Failure } from './Failure';
import { UnwrapOnSuccessError } from '../errors';
import { combineHash, hashString, payloadEquals, payloadHash } from '../utils/equality';
import { renderPayload } from '../utils/render';

const SUCCESS_TAG = hashString('Success');

/**
 * A ResultValue holding a success value.
 *
 * Instances are frozen on construction. Build them with `success()` rather
 * than `new` so the error type can be inferred from context.
 */
export class Success<T, E> implements ResultMethods<T, E> {
  readonly ok = true as const;

  constructor(readonly value: T) {
    Object.freeze(this);
  }

  isSuccess(): this is Success<T, E> {
    return true;
  }

  isFailure(): this is Failure<T, E> {
    return false;
  }

  isSuccessAnd(predicate: (value: T) => boolean): boolean {
    return predicate(this.value);
  }

  isFailureAnd(_predicate: (error: E) => boolean): boolean {
    return false;
  }

  successOrNone(): T | null {
    return this.value;
  }

  failureOrNone(): E | null {
    return null;
  }

  map<U>(f: (value: T) => U): ResultValue<U, E> {
    return new Success<U, E>(f(this.value));
  }

  mapError<F>(_f: (error: E) => F): ResultValue<T, F> {
    return new Success<T, F>(this.value);
  }

  mapOr<U>(_defaultValue: U, f: (value: T) => U): U {
    return f(this.value);
  }

  mapOrElse<U>(_onError: (error: E) => U, onSuccess: (value: T) => U): U {
    return onSuccess(this.value);
  }

  match<U>(handlers: MatchHandlers<T, E, U>): U {
    return handlers.success(this.value);
  }

  inspect(f: (value: T) => void): ResultValue<T, E> {
    f(this.value);
    return this;
  }

  inspectError(_f: (error: E) => void): ResultValue<T, E> {
    return this;
  }

  toSequence(): Iterable<T> {
    const value = this.value;
    return {
      *[Symbol.iterator]() {
        yield value;
      },
    };
  }

  and<U>(other: ResultValue<U, E>): ResultValue<U, E> {
    return other;
  }

  andThen<U>(f: (value: T) => ResultValue<U, E>): ResultValue<U, E> {
    return f(this.value);
  }

  or<F>(_other: ResultValue<T, F>): ResultValue<T, F> {
    return new Success<T, F>(this.value);
  }

  orElse<F>(_f: (error: E) => ResultValue<T, F>): ResultValue<T, F> {
    return new Success<T, F>(this.value);
  }

  flatten<U>(this: ResultValue<ResultValue<U, E>, E>): ResultValue<U, E> {
    return this.andThen((inner) => inner);
  }

  unwrap(): T {
    return this.value;
  }

  unwrapError(): E {
    throw new UnwrapOnSuccessError('called `unwrapError` on a `Success` value', this.value);
  }

  expect(_message: string): T {
    return this.value;
  }

  expectFailure(message: string): E {
    throw new UnwrapOnSuccessError(message, this.value);
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }

  unwrapOrElse(_f: (error: E) => T): T {
    return this.value;
  }

  unwrapOrDefault<C extends TypeToken>(_type: C & AcceptsDefault<C, T>): T {
    return this.value;
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    return other instanceof Success && payloadEquals(this.value, other.value);
  }

  hashCode(): number {
    return combineHash(SUCCESS_TAG, payloadHash(this.value));
  }

  toString(): string {
    return `Success(${renderPayload(this.value)})`;
  }
}
