export type {
  ConfigInvalidError,
  ConfigIssue,
  IndexOutOfBoundsError,
  InvalidArgumentError,
  InvalidFormatError,
  InvalidPatternError,
  MutationOperation,
  StrError,
  UnsupportedMutationError,
  ValidatedConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatStrError } from './formatter.js';
export { StrException } from './str-exception.js';
export { isStrError, isIndexOutOfBounds, isUnsupportedMutation } from './type-guards.js';
