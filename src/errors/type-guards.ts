import type { IndexOutOfBoundsError, StrError, UnsupportedMutationError } from './app-error.js';

const TAGS: ReadonlySet<string> = new Set<StrError['_tag']>([
  'ConfigInvalid',
  'IndexOutOfBounds',
  'UnsupportedMutation',
  'InvalidPattern',
  'InvalidFormat',
  'InvalidArgument',
]);

export function isStrError(e: unknown): e is StrError {
  return typeof e === 'object' && e !== null && '_tag' in e && typeof e._tag === 'string' && TAGS.has(e._tag);
}

export function isIndexOutOfBounds(e: StrError): e is IndexOutOfBoundsError {
  return e._tag === 'IndexOutOfBounds';
}

export function isUnsupportedMutation(e: StrError): e is UnsupportedMutationError {
  return e._tag === 'UnsupportedMutation';
}
