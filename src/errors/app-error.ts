import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/**
 * A requested index, offset, or computed span fell outside `[0, length]`.
 * `index` is the offending value exactly as it was computed (it may be negative).
 */
export type IndexOutOfBoundsError = Readonly<{
  readonly _tag: 'IndexOutOfBounds';
  readonly index: number;
  readonly message: string;
}>;

export type MutationOperation = 'set' | 'delete' | 'define';

export type UnsupportedMutationError = Readonly<{
  readonly _tag: 'UnsupportedMutation';
  readonly operation: MutationOperation;
  readonly property: string;
  readonly message: string;
}>;

export type InvalidPatternError = Readonly<{
  readonly _tag: 'InvalidPattern';
  readonly pattern: string;
  readonly reason: string;
  readonly message: string;
}>;

export type InvalidFormatError = Readonly<{
  readonly _tag: 'InvalidFormat';
  readonly format: string;
  readonly reason: string;
  readonly message: string;
}>;

export type InvalidArgumentError = Readonly<{
  readonly _tag: 'InvalidArgument';
  readonly argument: string;
  readonly reason: string;
  readonly message: string;
}>;

export type StrError =
  | IndexOutOfBoundsError
  | UnsupportedMutationError
  | InvalidPatternError
  | InvalidFormatError
  | InvalidArgumentError
  | ConfigInvalidError;

/**
 * Branded config type: only `loadStrConfig` (or the explicit test helper) produces one.
 */
export type ValidatedConfig<T> = Brand<T, 'ValidatedConfig'>;
