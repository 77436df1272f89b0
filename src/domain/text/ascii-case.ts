/**
 * Byte-table case mapping: only `A-Z` / `a-z` change, everything else is kept.
 * Lengths are preserved, so indices found in a folded string are valid in the original.
 */
export function toAsciiLower(value: string): string {
  return value.replace(/[A-Z]/g, (c) => String.fromCharCode(c.charCodeAt(0) + 32));
}

export function toAsciiUpper(value: string): string {
  return value.replace(/[a-z]/g, (c) => String.fromCharCode(c.charCodeAt(0) - 32));
}

export type Ordering = -1 | 0 | 1;

/** Three-way code-unit comparison. */
export function compareCodeUnits(a: string, b: string): Ordering {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareFolded(a: string, b: string, ignoreCase: boolean): Ordering {
  return ignoreCase ? compareCodeUnits(toAsciiLower(a), toAsciiLower(b)) : compareCodeUnits(a, b);
}

/** Compare at most `length` code units of each string. */
export function compareBounded(a: string, b: string, length: number, ignoreCase: boolean): Ordering {
  return compareFolded(a.slice(0, length), b.slice(0, length), ignoreCase);
}
