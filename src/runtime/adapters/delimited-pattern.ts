import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

/**
 * A delimited pattern split into its parts, before compilation.
 */
export interface DelimitedPattern {
  readonly body: string;
  readonly modifiers: string;
}

const BRACKET_PAIRS: Readonly<Record<string, string>> = {
  '(': ')',
  '[': ']',
  '{': '}',
  '<': '>',
};

/**
 * Split `/body/modifiers` (or `#body#i`, `{body}x`, ...) into body and modifiers.
 *
 * Leading whitespace is skipped. The delimiter may be any character except an
 * alphanumeric, a backslash or NUL. Bracket delimiters nest.
 */
export function parseDelimitedPattern(pattern: string): Result<DelimitedPattern, string> {
  const source = pattern.replace(/^\s+/, '');
  if (source.length === 0) {
    return err('Empty regular expression');
  }

  const start = source.charAt(0);
  if (/[A-Za-z0-9\\\0]/.test(start)) {
    return err('Delimiter must not be alphanumeric, backslash, or NUL');
  }

  const close = BRACKET_PAIRS[start];
  const end = close === undefined ? findClosing(source, start) : findNestedClosing(source, start, close);
  if (end < 0) {
    return close === undefined
      ? err(`No ending delimiter '${start}' found`)
      : err(`No ending matching delimiter '${close}' found`);
  }

  return ok({ body: source.slice(1, end), modifiers: source.slice(end + 1) });
}

function findClosing(source: string, delimiter: string): number {
  for (let i = 1; i < source.length; i++) {
    const c = source.charAt(i);
    if (c === '\\') {
      i++;
    } else if (c === delimiter) {
      return i;
    }
  }
  return -1;
}

function findNestedClosing(source: string, open: string, close: string): number {
  let depth = 1;
  for (let i = 1; i < source.length; i++) {
    const c = source.charAt(i);
    if (c === '\\') {
      i++;
    } else if (c === close && --depth === 0) {
      return i;
    } else if (c === open) {
      depth++;
    }
  }
  return -1;
}
