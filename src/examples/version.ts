/**
 * Version header parsing, showing how callers build and consume results.
 *
 * @module examples/version
 */

import { z } from 'zod';
import type { ResultValue } from '../types/result';
import { failure, fromSafeParse, success } from '../utils/result';

export enum Version {
  VersionOne = 1,
  VersionTwo = 2,
}

/**
 * Sink for the example's output lines.
 */
export type Logger = Pick<Console, 'log' | 'error'>;

const LOG_PREFIX = '[result-value]';

export const VersionInputSchema = z.coerce
  .number({ invalid_type_error: 'version must be a number' })
  .int('version must be an integer');

/**
 * Parse a version number into a {@link Version}.
 *
 * @example
 * ```typescript
 * parseVersion(2); // Success(2)
 * parseVersion(3); // Failure("invalid version")
 * ```
 */
export function parseVersion(versionNumber: number): ResultValue<Version, string> {
  if (versionNumber === 1) {
    return success(Version.VersionOne);
  }

  if (versionNumber === 2) {
    return success(Version.VersionTwo);
  }

  return failure('invalid version');
}

/**
 * Validate raw input (e.g. a header string) and parse it into a {@link Version}.
 */
export function parseVersionInput(raw: unknown): ResultValue<Version, string> {
  return fromSafeParse(VersionInputSchema.safeParse(raw))
    .mapError((error) => error.issues.map((issue) => issue.message).join(', '))
    .andThen(parseVersion);
}

/**
 * Parse a version number and log what a caller would do with it, using
 * unwrapping, mapping and a fallback.
 *
 * @returns The parsed version result
 */
export function describeVersion(
  versionNumber: number,
  logger: Logger = console,
): ResultValue<Version, string> {
  const version = parseVersion(versionNumber);

  if (version.isSuccess()) {
    logger.log(`${LOG_PREFIX} unwrap: working with version: ${Version[version.unwrap()]}`);
  } else {
    logger.error(`${LOG_PREFIX} unwrap: error parsing header: ${version.unwrapError()}`);
  }

  version.mapOrElse(
    (error) => logger.error(`${LOG_PREFIX} mapOrElse: error parsing header: ${error}`),
    (value) => logger.log(`${LOG_PREFIX} mapOrElse: working with version: ${Version[value]}`),
  );

  const effective = version.unwrapOr(Version.VersionOne);
  logger.log(`${LOG_PREFIX} unwrapOr: using version: ${Version[effective]}`);

  return version;
}
