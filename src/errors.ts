import { renderPayload } from './utils/render';

export type ResultErrorCode =
  | 'UNWRAP_ON_FAILURE'
  | 'UNWRAP_ON_SUCCESS'
  | 'UNSUPPORTED_DEFAULT_TYPE';

/**
 * Base class for errors thrown by ResultValue extraction methods.
 *
 * `diagnostic` is the bare message; `message` appends the rendered payload.
 */
export abstract class ResultError extends Error {
  abstract readonly code: ResultErrorCode;

  constructor(
    public readonly diagnostic: string,
    message: string,
  ) {
    super(message);
    this.name = 'ResultError';
  }
}

/**
 * Thrown by `unwrap` and `expect` on a Failure.
 */
export class UnwrapOnFailureError<E = unknown> extends ResultError {
  readonly code = 'UNWRAP_ON_FAILURE';

  constructor(
    diagnostic: string,
    public readonly payload: E,
  ) {
    super(diagnostic, `${diagnostic}: ${renderPayload(payload)}`);
    this.name = 'UnwrapOnFailureError';
  }
}

/**
 * Thrown by `unwrapError` and `expectFailure` on a Success.
 */
export class UnwrapOnSuccessError<T = unknown> extends ResultError {
  readonly code = 'UNWRAP_ON_SUCCESS';

  constructor(
    diagnostic: string,
    public readonly payload: T,
  ) {
    super(diagnostic, `${diagnostic}: ${renderPayload(payload)}`);
    this.name = 'UnwrapOnSuccessError';
  }
}

/**
 * Thrown by `unwrapOrDefault` on a Failure when the requested type has no
 * known default.
 */
export class UnsupportedDefaultTypeError extends ResultError {
  readonly code = 'UNSUPPORTED_DEFAULT_TYPE';

  constructor(public readonly typeName: string) {
    super(unsupportedTypeMessage(typeName), unsupportedTypeMessage(typeName));
    this.name = 'UnsupportedDefaultTypeError';
  }
}

function unsupportedTypeMessage(typeName: string): string {
  return `Type ${typeName} is not supported, please use unwrapOr or unwrapOrElse`;
}
