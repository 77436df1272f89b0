import type { Logger } from '../../core/logging/index.js';

export const DEFAULT_TRIM_MASK = ' \t\n\r\0\x0B';

/**
 * A set of code units built from a trim mask.
 *
 * `a..z` in the mask stands for the inclusive range. A `..` that is not part of a
 * well-formed range is reported and skipped; its neighbours are taken literally.
 */
export type CharMask = ReadonlySet<number>;

export const DEFAULT_CHAR_MASK: CharMask = new Set([...DEFAULT_TRIM_MASK].map((c) => c.charCodeAt(0)));

export function parseCharMask(mask: string, logger: Logger): CharMask {
  const set = new Set<number>();

  for (let i = 0; i < mask.length; i++) {
    const c = mask.charCodeAt(i);
    const isRange = i + 3 < mask.length && mask[i + 1] === '.' && mask[i + 2] === '.';

    if (isRange && mask.charCodeAt(i + 3) >= c) {
      for (let code = c; code <= mask.charCodeAt(i + 3); code++) set.add(code);
      i += 3;
    } else if (i + 1 < mask.length && mask[i] === '.' && mask[i + 1] === '.') {
      logger.warn({ mask, position: i }, describeMalformedRange(mask, i));
    } else {
      set.add(c);
    }
  }

  return set;
}

function describeMalformedRange(mask: string, position: number): string {
  if (position === 0) return "Invalid '..'-range, no character to the left of '..'";
  if (position + 2 >= mask.length) return "Invalid '..'-range, no character to the right of '..'";
  if (mask.charCodeAt(position - 1) > mask.charCodeAt(position + 2)) {
    return "Invalid '..'-range, '..'-range needs to be incrementing";
  }
  return "Invalid '..'-range";
}

export function trimStart(value: string, mask: CharMask): string {
  let start = 0;
  while (start < value.length && mask.has(value.charCodeAt(start))) start++;
  return value.slice(start);
}

export function trimEnd(value: string, mask: CharMask): string {
  let end = value.length;
  while (end > 0 && mask.has(value.charCodeAt(end - 1))) end--;
  return value.slice(0, end);
}
