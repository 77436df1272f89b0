import type { StrError } from './app-error.js';
import { formatStrError } from './formatter.js';

/**
 * Thrown form of a `StrError`.
 *
 * Only the indexed-access boundary throws (a `Proxy` trap has no way to return a Result);
 * every method reports the same errors as data instead.
 */
export class StrException extends Error {
  constructor(readonly error: StrError) {
    super(formatStrError(error));
    this.name = 'StrException';
  }
}
