import type {
  ConfigInvalidError,
  ConfigIssue,
  IndexOutOfBoundsError,
  InvalidArgumentError,
  InvalidFormatError,
  InvalidPatternError,
  MutationOperation,
  StrError,
  UnsupportedMutationError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  indexOutOfBounds: (index: number): IndexOutOfBoundsError => ({
    _tag: 'IndexOutOfBounds',
    index,
    message: `String index out of range: ${index}`,
  }),

  unsupportedMutation: (operation: MutationOperation, property: string): UnsupportedMutationError => ({
    _tag: 'UnsupportedMutation',
    operation,
    property,
    message: 'Strings are immutable',
  }),

  invalidPattern: (pattern: string, reason: string): InvalidPatternError => ({
    _tag: 'InvalidPattern',
    pattern,
    reason,
    message: `Invalid pattern ${pattern}: ${reason}`,
  }),

  invalidFormat: (format: string, reason: string): InvalidFormatError => ({
    _tag: 'InvalidFormat',
    format,
    reason,
    message: `Invalid format string: ${reason}`,
  }),

  invalidArgument: (argument: string, reason: string): InvalidArgumentError => ({
    _tag: 'InvalidArgument',
    argument,
    reason,
    message: `Invalid argument '${argument}': ${reason}`,
  }),
} as const satisfies Record<string, (...args: never[]) => StrError>;
