export type { ResultValue, ResultMethods, MatchHandlers } from './types/result';
export { Success } from './result/Success';
export { Failure } from './result/Failure';

export {
  success,
  failure,
  isSuccess,
  isFailure,
  flatten,
  tryCatch,
  fromNullable,
  fromSafeParse,
  collect,
  partition,
} from './utils/result';

export type { TypeToken, DefaultOf, AcceptsDefault, UnsupportedDefault } from './utils/defaults';
export { defaultFor, isDefaultable } from './utils/defaults';

export type { Equatable, Hashable } from './utils/equality';
export { payloadEquals, payloadHash } from './utils/equality';

export { renderPayload } from './utils/render';

export type { DurationParts } from './types/duration';
export { Duration } from './types/duration';

export type { ResultErrorCode } from './errors';
export {
  ResultError,
  UnwrapOnFailureError,
  UnwrapOnSuccessError,
  UnsupportedDefaultTypeError,
} from './errors';

export type { RenderConfig, RenderOptions } from './config';
export { RenderConfigSchema, DEFAULT_RENDER_CONFIG } from './config';

export type { Logger } from './examples/version';
export {
  Version,
  VersionInputSchema,
  parseVersion,
  parseVersionInput,
  describeVersion,
} from './examples/version';
