/**
 * Canonical default values for `unwrapOrDefault`.
 *
 * Defaults come from a closed whitelist keyed by the runtime constructor
 * standing in for the type. {@link DefaultOf} mirrors the whitelist at the
 * type level, so a whitelisted token whose default does not fit the result
 * type is rejected at compile time. Tokens outside the whitelist are
 * rejected at runtime rather than guessed at.
 *
 * @module defaults
 */

import { UnsupportedDefaultTypeError } from '../errors';
import { Duration } from '../types/duration';

/**
 * Runtime stand-in for a type: a converter such as `Number` or `String`,
 * or a class such as `Map` or `Date`.
 */
export type TypeToken =
  | ((...args: never[]) => unknown)
  | (abstract new (...args: never[]) => unknown);

declare const UnsupportedBrand: unique symbol;

/** Marker produced by {@link DefaultOf} for tokens outside the whitelist. */
export type UnsupportedDefault = { readonly [UnsupportedBrand]: true };

/**
 * The default value type a token produces, or {@link UnsupportedDefault}.
 */
export type DefaultOf<C> = [C] extends [NumberConstructor]
  ? number
  : [C] extends [StringConstructor]
    ? string
    : [C] extends [BooleanConstructor]
      ? boolean
      : [C] extends [BigIntConstructor]
        ? bigint
        : [C] extends [ArrayConstructor]
          ? never[]
          : [C] extends [MapConstructor]
            ? Map<never, never>
            : [C] extends [SetConstructor]
              ? Set<never>
              : [C] extends [typeof Duration]
                ? Duration
                : [C] extends [DateConstructor]
                  ? Date
                  : [C] extends [RegExpConstructor]
                    ? RegExp
                    : [C] extends [typeof URL]
                      ? URL
                      : UnsupportedDefault;

/**
 * `unknown` when token C may default a T, `never` when its default does not
 * fit T. Unsupported tokens pass here and fail at runtime.
 *
 * @example
 * ```typescript
 * type Ok = AcceptsDefault<NumberConstructor, number>; // unknown
 * type Rejected = AcceptsDefault<DateConstructor, string>; // never
 * ```
 */
export type AcceptsDefault<C, T> = [DefaultOf<C>] extends [UnsupportedDefault]
  ? unknown
  : [DefaultOf<C>] extends [T]
    ? unknown
    : never;

interface WellKnownDefault {
  readonly type: TypeToken;
  readonly create: () => unknown;
}

const WELL_KNOWN_DEFAULTS: readonly WellKnownDefault[] = [
  { type: Number, create: () => 0 },
  { type: String, create: () => '' },
  { type: Boolean, create: () => false },
  { type: BigInt, create: () => 0n },
  { type: Array, create: () => [] },
  { type: Map, create: () => new Map() },
  { type: Set, create: () => new Set() },
  { type: Duration, create: () => Duration.ZERO },
  { type: Date, create: () => new Date(0) },
  { type: RegExp, create: () => new RegExp('') },
  { type: URL, create: () => new URL('about:blank') },
];

/**
 * Returns true if `type` has a canonical default.
 */
export function isDefaultable(type: TypeToken): boolean {
  return WELL_KNOWN_DEFAULTS.some((entry) => entry.type === type);
}

/**
 * Produce the canonical default value for a well-known type.
 *
 * Mutable defaults (arrays, maps, sets, dates, ...) are created fresh on
 * every call.
 *
 * @param type - The type token, e.g. `Number` or `Map`
 * @returns The default value for the type
 * @throws {UnsupportedDefaultTypeError} If the type is not whitelisted
 *
 * @example
 * ```typescript
 * defaultFor(Number); // 0
 * defaultFor(Date); // 1970-01-01T00:00:00.000Z
 * defaultFor(Object); // throws UnsupportedDefaultTypeError
 * ```
 */
export function defaultFor<C extends TypeToken, T = DefaultOf<C>>(
  type: C & AcceptsDefault<C, T>,
): T {
  const entry = WELL_KNOWN_DEFAULTS.find((candidate) => candidate.type === type);
  const value = entry?.create();
  if (entry === undefined || !isDefaultFor<C, T>(type, value)) {
    throw new UnsupportedDefaultTypeError(typeNameOf(type));
  }
  return value;
}

/**
 * Checks that `value` is what `type` produces. Only callable with a token
 * whose default fits T.
 */
function isDefaultFor<C extends TypeToken, T>(
  type: C & AcceptsDefault<C, T>,
  value: unknown,
): value is T {
  const token: TypeToken = type;
  switch (typeof value) {
    case 'number':
      return token === Number;
    case 'string':
      return token === String;
    case 'boolean':
      return token === Boolean;
    case 'bigint':
      return token === BigInt;
    default:
      return value instanceof token;
  }
}

function typeNameOf(type: TypeToken): string {
  return type.name || '<anonymous>';
}
