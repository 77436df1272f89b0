import type { Result } from 'neverthrow';
import type { InvalidPatternError } from '../../errors/app-error.js';

/**
 * A pattern as callers write it: a delimited string such as `/a+b/i`, or a RegExp.
 */
export type PatternSource = string | RegExp;

/**
 * Match and capture groups, group 0 first. Unmatched groups are `''`;
 * unmatched groups after the last matched one are dropped.
 */
export type MatchGroups = readonly string[];

export interface RegexReplacement {
  readonly value: string;
  readonly count: number;
}

/**
 * Port for the regular-expression capability the string type depends on.
 *
 * Pattern dialect (delimiters, modifiers, substitution syntax) belongs to the
 * adapter; callers only rely on the operations below.
 */
export interface RegexEngine {
  /** Human-readable dialect name, for diagnostics. */
  readonly dialect: string;

  /** Escape `literal` so it matches itself inside a `/`-delimited pattern body. */
  quote(literal: string): string;

  /** First match anywhere in `subject`, or null. */
  exec(pattern: PatternSource, subject: string): Result<MatchGroups | null, InvalidPatternError>;

  /** Replace up to `limit` matches (`limit <= 0` = all), left to right. */
  replace(
    pattern: PatternSource,
    subject: string,
    replacement: string,
    limit: number
  ): Result<RegexReplacement, InvalidPatternError>;

  /**
   * Fragments between matches. With `limit > 0` at most `limit` fragments, the
   * last unsplit; `0` and `-1` are unbounded; below `-1` the subject is not split.
   */
  split(pattern: PatternSource, subject: string, limit: number): Result<readonly string[], InvalidPatternError>;
}
