import type { StrError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatStrError(error: StrError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'IndexOutOfBounds':
      return error.message;

    case 'UnsupportedMutation':
      return `${error.message} (attempted ${error.operation} of '${error.property}')`;

    case 'InvalidPattern':
    case 'InvalidFormat':
    case 'InvalidArgument':
      return error.message;

    default:
      return assertNever(error);
  }
}
