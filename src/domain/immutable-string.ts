import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type {
  IndexOutOfBoundsError,
  InvalidArgumentError,
  InvalidFormatError,
  InvalidPatternError,
} from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { StrException } from '../errors/str-exception.js';
import type { StringContext } from '../di/string-context.js';
import { getDefaultStringContext } from '../di/string-context.js';
import type { PatternSource } from '../runtime/ports/regex-engine.js';
import type { Ordering } from './text/ascii-case.js';
import { compareBounded, compareFolded, toAsciiLower, toAsciiUpper } from './text/ascii-case.js';
import type { CharMask } from './text/char-mask.js';
import { DEFAULT_CHAR_MASK, DEFAULT_TRIM_MASK, parseCharMask, trimEnd, trimStart } from './text/char-mask.js';
import type { FormatArg } from './text/sprintf.js';
import { sprintf } from './text/sprintf.js';

/** Anything accepted where text is expected; coerced with `String()`. */
export type StringLike = string | number | bigint | ImmutableString;

/** A literal or pattern replacement: the new string plus how many replacements were made. */
export interface Replacement {
  readonly value: ImmutableString;
  readonly count: number;
}

/** Outcome of `match`: group 0 is the whole match. Empty when nothing matched. */
export interface RegexMatch {
  readonly matched: boolean;
  readonly groups: readonly ImmutableString[];
}

/**
 * Static factories bound to one context.
 */
export interface StringFactory {
  of(source?: StringLike): ImmutableString;
  ofRange(source: StringLike, offset: number, length: number): Result<ImmutableString, IndexOutOfBoundsError>;
  format(format: StringLike, ...args: FormatArg[]): Result<ImmutableString, InvalidFormatError>;
  fromCharCode(codes: readonly number[] | number, ...rest: number[]): ImmutableString;
  join(delimiter: StringLike, elements: Iterable<StringLike>): ImmutableString;
}

/** Longest string the host engine can allocate (V8, 64-bit). */
export const MAX_STRING_LENGTH = 2 ** 29 - 24;

const INDEX_KEY = /^(?:0|-?[1-9]\d*)$/;

function toIndex(property: string | symbol): number | null {
  return typeof property === 'string' && INDEX_KEY.test(property) ? Number(property) : null;
}

function rejectMutation(operation: 'set' | 'delete' | 'define', property: string | symbol): never {
  throw new StrException(Err.unsupportedMutation(operation, String(property)));
}

/**
 * Integer keys read through `charAt`; every write is refused.
 */
const INDEXED_ACCESS: ProxyHandler<ImmutableString> = {
  get(target, property, receiver) {
    const index = toIndex(property);
    if (index === null) return Reflect.get(target, property, receiver);
    return target.charAt(index).match(
      (c) => c,
      (error) => {
        throw new StrException(error);
      }
    );
  },
  has(target, property) {
    const index = toIndex(property);
    return index === null ? Reflect.has(target, property) : target.hasIndex(index);
  },
  set: (_target, property) => rejectMutation('set', property),
  deleteProperty: (_target, property) => rejectMutation('delete', property),
  defineProperty: (_target, property) => rejectMutation('define', property),
};

function toText(source: StringLike): string {
  return typeof source === 'string' ? source : String(source);
}

/**
 * ImmutableString
 *
 * Wraps a text value and its length, both fixed at construction. Methods that
 * "modify" the string return a new instance; methods that can fail return a
 * neverthrow `Result` instead of throwing.
 *
 * Indexing is by UTF-16 code unit. `s[i]` reads like `charAt(i)` but throws a
 * `StrException` when `i` is out of range; writes and deletes through an index
 * (or any property) throw a `StrException` carrying `UnsupportedMutation`.
 *
 * Case-insensitive operations fold ASCII letters only. Pattern operations go
 * through the context's `RegexEngine`; with the default engine a pattern is a
 * delimited string such as `/[,;]/i` or a `RegExp`.
 */
export class ImmutableString {
  readonly [index: number]: string;

  readonly length: number;

  private readonly value: string;

  private readonly context: StringContext;

  private constructor(value: string, context: StringContext) {
    this.value = value;
    this.length = value.length;
    this.context = context;
    return new Proxy(this, INDEXED_ACCESS);
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Factories whose instances (and everything derived from them) use `context`.
   */
  static withContext(context: StringContext): StringFactory {
    return {
      of: (source = '') => new ImmutableString(toText(source), context),

      ofRange: (source, offset, length) => {
        const text = toText(source);
        if (!Number.isInteger(offset) || offset < 0) return err(Err.indexOutOfBounds(offset));
        if (!Number.isInteger(length) || length < 0) return err(Err.indexOutOfBounds(length));
        if (offset > text.length - length) return err(Err.indexOutOfBounds(offset + length));
        return ok(new ImmutableString(text.slice(offset, offset + length), context));
      },

      format: (format, ...args) => {
        const text = toText(format);
        if (args.length === 0) return ok(new ImmutableString(text, context));
        return sprintf(text, args).map((formatted) => new ImmutableString(formatted, context));
      },

      fromCharCode: (codes, ...rest) => {
        const all = typeof codes === 'number' ? [codes, ...rest] : codes;
        return new ImmutableString(all.map((code) => String.fromCharCode(code)).join(''), context);
      },

      join: (delimiter, elements) =>
        new ImmutableString(Array.from(elements, toText).join(toText(delimiter)), context),
    };
  }

  static of(source: StringLike = ''): ImmutableString {
    return ImmutableString.withContext(getDefaultStringContext()).of(source);
  }

  /**
   * The `length` code units of `source` starting at `offset`.
   */
  static ofRange(source: StringLike, offset: number, length: number): Result<ImmutableString, IndexOutOfBoundsError> {
    return ImmutableString.withContext(getDefaultStringContext()).ofRange(source, offset, length);
  }

  /**
   * printf-style formatting (`%s`, `%05d`, `%'*10s`, `%2$s`, ...). With no
   * arguments the format string is taken verbatim.
   */
  static format(format: StringLike, ...args: FormatArg[]): Result<ImmutableString, InvalidFormatError> {
    return ImmutableString.withContext(getDefaultStringContext()).format(format, ...args);
  }

  /** One code unit per code, from an array or from the arguments. */
  static fromCharCode(codes: readonly number[] | number, ...rest: number[]): ImmutableString {
    return ImmutableString.withContext(getDefaultStringContext()).fromCharCode(codes, ...rest);
  }

  static join(delimiter: StringLike, elements: Iterable<StringLike>): ImmutableString {
    return ImmutableString.withContext(getDefaultStringContext()).join(delimiter, elements);
  }

  /** Comparator for `Array.prototype.sort`. */
  static compare(a: StringLike, b: StringLike): Ordering {
    return compareFolded(toText(a), toText(b), false);
  }

  private derive(value: string): ImmutableString {
    return new ImmutableString(value, this.context);
  }

  // ===========================================================================
  // Character access
  // ===========================================================================

  charAt(index: number): Result<string, IndexOutOfBoundsError> {
    if (!this.hasIndex(index)) {
      return err(Err.indexOutOfBounds(index));
    }
    return ok(this.value.charAt(index));
  }

  charCodeAt(index: number): Result<number, IndexOutOfBoundsError> {
    return this.charAt(index).map((c) => c.charCodeAt(0));
  }

  /** Whether `s[index]` would succeed. */
  hasIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.length;
  }

  // ===========================================================================
  // Comparison
  // ===========================================================================

  compareTo(other: StringLike, ignoreCase = false): Ordering {
    return compareFolded(this.value, toText(other), ignoreCase);
  }

  compareToIgnoreCase(other: StringLike): Ordering {
    return this.compareTo(other, true);
  }

  equals(other: StringLike, ignoreCase = false): boolean {
    return this.compareTo(other, ignoreCase) === 0;
  }

  equalsIgnoreCase(other: StringLike): boolean {
    return this.equals(other, true);
  }

  /**
   * Compares at most `length` code units of this string from `thisOffset` with
   * `other` from `otherOffset`. Each offset is checked like `substring(offset)`;
   * a window that runs past the end compares whatever is left.
   */
  regionCompare(
    thisOffset: number,
    other: StringLike,
    otherOffset: number,
    length: number,
    ignoreCase = false
  ): Result<Ordering, IndexOutOfBoundsError> {
    if (length < 0) return err(Err.indexOutOfBounds(length));
    const that = other instanceof ImmutableString ? other : this.derive(toText(other));

    return this.substring(thisOffset).andThen((mine) =>
      that.substring(otherOffset).map((theirs) => compareBounded(mine.value, theirs.value, length, ignoreCase))
    );
  }

  regionCompareIgnoreCase(
    thisOffset: number,
    other: StringLike,
    otherOffset: number,
    length: number
  ): Result<Ordering, IndexOutOfBoundsError> {
    return this.regionCompare(thisOffset, other, otherOffset, length, true);
  }

  regionMatches(
    thisOffset: number,
    other: StringLike,
    otherOffset: number,
    length: number,
    ignoreCase = false
  ): Result<boolean, IndexOutOfBoundsError> {
    return this.regionCompare(thisOffset, other, otherOffset, length, ignoreCase).map((order) => order === 0);
  }

  regionMatchesIgnoreCase(
    thisOffset: number,
    other: StringLike,
    otherOffset: number,
    length: number
  ): Result<boolean, IndexOutOfBoundsError> {
    return this.regionMatches(thisOffset, other, otherOffset, length, true);
  }

  // ===========================================================================
  // Searching
  // ===========================================================================

  /**
   * First occurrence of `str` at or after `fromIndex` (negative means 0), or -1.
   * Always -1 when `fromIndex >= length`.
   */
  indexOf(str: StringLike, fromIndex = 0, ignoreCase = false): number {
    if (fromIndex >= this.length) return -1;
    const [haystack, needle] = this.folded(toText(str), ignoreCase);
    return haystack.indexOf(needle, Math.max(fromIndex, 0));
  }

  indexOfIgnoreCase(str: StringLike, fromIndex = 0): number {
    return this.indexOf(str, fromIndex, true);
  }

  /**
   * Rightmost occurrence of `str` that starts at or after `fromIndex`, or -1.
   * The search is bounded on the left by `fromIndex`, not on the right.
   */
  lastIndexOf(str: StringLike, fromIndex = 0, ignoreCase = false): number {
    if (fromIndex >= this.length) return -1;
    const [haystack, needle] = this.folded(toText(str), ignoreCase);
    const index = haystack.lastIndexOf(needle);
    return index >= Math.max(fromIndex, 0) ? index : -1;
  }

  lastIndexOfIgnoreCase(str: StringLike, fromIndex = 0): number {
    return this.lastIndexOf(str, fromIndex, true);
  }

  contains(str: StringLike): boolean {
    return this.indexOf(str) >= 0;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  private folded(needle: string, ignoreCase: boolean): readonly [string, string] {
    return ignoreCase ? [toAsciiLower(this.value), toAsciiLower(needle)] : [this.value, needle];
  }

  // ===========================================================================
  // Slicing
  // ===========================================================================

  /**
   * Code units `[begin, end)`; `end` defaults to `length`. Returns this instance
   * when the span covers the whole string.
   */
  substring(begin: number, end?: number): Result<ImmutableString, IndexOutOfBoundsError> {
    if (!Number.isInteger(begin) || begin < 0) return err(Err.indexOutOfBounds(begin));
    if (end !== undefined && !Number.isInteger(end)) return err(Err.indexOutOfBounds(end));
    if (begin === this.length) return ok(this.derive(''));
    if (end !== undefined && end > this.length) return err(Err.indexOutOfBounds(end));

    const stop = end ?? this.length;
    const span = stop - begin;
    if (span < 0) return err(Err.indexOutOfBounds(span));
    if (begin === 0 && stop === this.length) return ok(this);

    return ok(this.derive(this.value.slice(begin, stop)));
  }

  // ===========================================================================
  // Pattern matching
  // ===========================================================================

  matches(pattern: PatternSource): Result<boolean, InvalidPatternError> {
    return this.context.regex.exec(pattern, this.value).map((groups) => groups !== null);
  }

  match(pattern: PatternSource): Result<RegexMatch, InvalidPatternError> {
    return this.context.regex.exec(pattern, this.value).map((groups) => ({
      matched: groups !== null,
      groups: (groups ?? []).map((group) => this.derive(group)),
    }));
  }

  /** `prefix` is literal text, matched at `fromIndex`. */
  startsWith(
    prefix: StringLike,
    fromIndex = 0,
    ignoreCase = false
  ): Result<boolean, IndexOutOfBoundsError | InvalidPatternError> {
    const pattern = `/^${this.context.regex.quote(toText(prefix))}/${ignoreCase ? 'i' : ''}`;
    return this.substring(fromIndex).andThen((rest) => rest.matches(pattern));
  }

  /** `suffix` is literal text; a single trailing newline after it is allowed. */
  endsWith(suffix: StringLike, ignoreCase = false): Result<boolean, InvalidPatternError> {
    return this.matches(`/${this.context.regex.quote(toText(suffix))}(?=\\n?$)/${ignoreCase ? 'i' : ''}`);
  }

  /** Literal replacement of every non-overlapping occurrence, left to right. */
  replace(search: StringLike, replacement: StringLike): Replacement {
    return this.replaceLiteral(toText(search), toText(replacement), false);
  }

  replaceIgnoreCase(search: StringLike, replacement: StringLike): Replacement {
    return this.replaceLiteral(toText(search), toText(replacement), true);
  }

  /**
   * Replaces up to `limit` pattern matches (all when omitted or `<= 0`).
   * `replacement` may reference groups in the engine's substitution syntax.
   */
  replaceAll(
    pattern: PatternSource,
    replacement: StringLike,
    limit?: number
  ): Result<Replacement, InvalidPatternError> {
    return this.context.regex
      .replace(pattern, this.value, toText(replacement), limit ?? -1)
      .map(({ value, count }) => ({ value: this.derive(value), count }));
  }

  replaceFirst(pattern: PatternSource, replacement: StringLike): Result<Replacement, InvalidPatternError> {
    return this.replaceAll(pattern, replacement, 1);
  }

  /**
   * Fragments between pattern matches. With `limit > 0` there are at most
   * `limit` fragments and the last one holds the rest of the string unsplit;
   * `0`, `-1` or omitted means no limit, and below `-1` nothing is split.
   */
  split(pattern: PatternSource, limit?: number): Result<readonly ImmutableString[], InvalidPatternError> {
    return this.context.regex
      .split(pattern, this.value, limit ?? -1)
      .map((parts) => parts.map((part) => this.derive(part)));
  }

  private replaceLiteral(search: string, replacement: string, ignoreCase: boolean): Replacement {
    if (search === '') return { value: this, count: 0 };

    const [haystack, needle] = this.folded(search, ignoreCase);
    let out = '';
    let last = 0;
    let count = 0;

    for (let at = haystack.indexOf(needle); at >= 0; at = haystack.indexOf(needle, last)) {
      out += this.value.slice(last, at) + replacement;
      last = at + needle.length;
      count++;
    }

    return count === 0 ? { value: this, count } : { value: this.derive(out + this.value.slice(last)), count };
  }

  // ===========================================================================
  // Case & whitespace
  // ===========================================================================

  toLowerCase(): ImmutableString {
    return this.derive(toAsciiLower(this.value));
  }

  toUpperCase(): ImmutableString {
    return this.derive(toAsciiUpper(this.value));
  }

  /**
   * Strips characters in `mask` from both ends. `mask` is a set of characters;
   * `a..z` stands for a range.
   */
  trim(mask: StringLike = DEFAULT_TRIM_MASK): ImmutableString {
    const set = this.charMask(mask);
    return this.derive(trimEnd(trimStart(this.value, set), set));
  }

  trimLeft(mask: StringLike = DEFAULT_TRIM_MASK): ImmutableString {
    return this.derive(trimStart(this.value, this.charMask(mask)));
  }

  trimRight(mask: StringLike = DEFAULT_TRIM_MASK): ImmutableString {
    return this.derive(trimEnd(this.value, this.charMask(mask)));
  }

  private charMask(mask: StringLike): CharMask {
    const text = toText(mask);
    return text === DEFAULT_TRIM_MASK ? DEFAULT_CHAR_MASK : parseCharMask(text, this.context.logger);
  }

  // ===========================================================================
  // Conversion
  // ===========================================================================

  toCharArray(): readonly string[] {
    return this.value.split('');
  }

  concat(...parts: StringLike[]): ImmutableString {
    return this.derive(this.value + parts.map(toText).join(''));
  }

  reverse(): ImmutableString {
    return this.derive(this.value.split('').reverse().join(''));
  }

  /**
   * Pads on the left with `pad`, repeated and truncated, up to `targetLength`
   * code units. `targetLength` is capped at `MAX_STRING_LENGTH`.
   */
  padLeft(targetLength: number, pad: StringLike = ' '): Result<ImmutableString, InvalidArgumentError> {
    return this.padded(targetLength, toText(pad), 'left');
  }

  padRight(targetLength: number, pad: StringLike = ' '): Result<ImmutableString, InvalidArgumentError> {
    return this.padded(targetLength, toText(pad), 'right');
  }

  private padded(
    targetLength: number,
    pad: string,
    side: 'left' | 'right'
  ): Result<ImmutableString, InvalidArgumentError> {
    if (pad === '') return err(Err.invalidArgument('pad', 'must be a non-empty string'));
    if (!Number.isFinite(targetLength) || targetLength > MAX_STRING_LENGTH) {
      return err(Err.invalidArgument('targetLength', `must be a finite number no greater than ${MAX_STRING_LENGTH}`));
    }
    if (targetLength <= this.length) return ok(this);
    return ok(
      this.derive(side === 'left' ? this.value.padStart(targetLength, pad) : this.value.padEnd(targetLength, pad))
    );
  }

  valueOf(): string {
    return this.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
