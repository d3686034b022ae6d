/**
 * Payload equality and hashing for ResultValue.
 *
 * Payloads may opt into structural equality by implementing `equals` and
 * `hashCode`. Everything else compares with `Object.is`: primitives by
 * value, objects by identity.
 *
 * @module equality
 */

/**
 * A value that defines its own equality.
 */
export interface Equatable {
  equals(other: unknown): boolean;
}

/**
 * A value that defines its own hash. Equal values must return equal hashes.
 */
export interface Hashable {
  hashCode(): number;
}

const identityHashes = new WeakMap<object, number>();
let nextIdentityHash = 1;

export function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}

export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'hashCode' in value &&
    typeof value.hashCode === 'function'
  );
}

/**
 * Compare two payloads, delegating to `a.equals(b)` when `a` defines it.
 */
export function payloadEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) {
    return true;
  }
  return isEquatable(a) && a.equals(b);
}

/**
 * Hash a payload consistently with {@link payloadEquals}.
 *
 * @returns A 32-bit signed integer
 */
export function payloadHash(value: unknown): number {
  if (isHashable(value)) {
    return value.hashCode() | 0;
  }
  if ((typeof value === 'object' && value !== null) || typeof value === 'function') {
    return identityHash(value);
  }
  return hashString(`${typeof value}:${String(value)}`);
}

/**
 * 31-multiplier string hash.
 */
export function hashString(text: string): number {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * Combine a tag hash with a payload hash. Distinct tags always yield
 * distinct results for the same payload hash.
 */
export function combineHash(tag: number, hash: number): number {
  return (Math.imul(31, tag) + hash) | 0;
}

function identityHash(value: object): number {
  const existing = identityHashes.get(value);
  if (existing !== undefined) {
    return existing;
  }
  const hash = nextIdentityHash++;
  identityHashes.set(value, hash);
  return hash;
}
