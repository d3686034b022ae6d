/**
 * Immutable span of time with millisecond precision.
 */

import { combineHash, hashString } from '../utils/equality';

const DURATION_TAG = hashString('Duration');

/**
 * Components accepted by {@link Duration.of}. Missing components count as zero.
 *
 * @example
 * ```typescript
 * const timeout = Duration.of({ minutes: 1, seconds: 30 });
 * timeout.milliseconds; // 90000
 * ```
 */
export interface DurationParts {
  readonly days?: number;
  readonly hours?: number;
  readonly minutes?: number;
  readonly seconds?: number;
  readonly milliseconds?: number;
}

export class Duration {
  static readonly ZERO = new Duration(0);

  constructor(readonly milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new RangeError(`Duration must be finite, got ${milliseconds}`);
    }
    Object.freeze(this);
  }

  static of(parts: DurationParts): Duration {
    const { days = 0, hours = 0, minutes = 0, seconds = 0, milliseconds = 0 } = parts;
    return new Duration(
      (((days * 24 + hours) * 60 + minutes) * 60 + seconds) * 1000 + milliseconds,
    );
  }

  get inSeconds(): number {
    return this.milliseconds / 1000;
  }

  isZero(): boolean {
    return this.milliseconds === 0;
  }

  plus(other: Duration): Duration {
    return new Duration(this.milliseconds + other.milliseconds);
  }

  equals(other: unknown): boolean {
    return other instanceof Duration && other.milliseconds === this.milliseconds;
  }

  hashCode(): number {
    return combineHash(DURATION_TAG, hashString(String(this.milliseconds)));
  }

  toString(): string {
    return `${this.milliseconds}ms`;
  }
}
