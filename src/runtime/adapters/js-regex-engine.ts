import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { InvalidPatternError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type {
  MatchGroups,
  PatternSource,
  RegexEngine,
  RegexReplacement,
} from '../ports/regex-engine.js';
import { parseDelimitedPattern } from './delimited-pattern.js';
import { expandReplacement } from './substitution.js';

export interface JsRegexEngineOptions {
  /** Maximum number of compiled delimited patterns kept; 0 disables the cache. */
  readonly cacheSize: number;
  readonly logger: Logger;
}

const MODIFIER_FLAGS: Readonly<Record<string, string>> = {
  i: 'i',
  m: 'm',
  s: 's',
  u: 'u',
  A: 'y',
  D: '',
};

const UNSUPPORTED_MODIFIERS = new Set(['x', 'U', 'S', 'X', 'J', 'n']);

const SYNTAX_CHARACTERS = /[\\^$.*+?()[\]{}|/]/g;

/**
 * RegexEngine backed by the host's RegExp.
 *
 * Delimited patterns are parsed once and kept in a bounded cache, least recently
 * used evicted first. Every operation runs on a fresh global copy of the compiled
 * RegExp, so no `lastIndex` state is shared between calls.
 */
export class JsRegexEngine implements RegexEngine {
  readonly dialect = 'ECMAScript RegExp (delimited)';

  private readonly cache = new Map<string, RegExp>();

  constructor(private readonly options: JsRegexEngineOptions) {}

  quote(literal: string): string {
    return literal.replace(SYNTAX_CHARACTERS, '\\$&');
  }

  exec(pattern: PatternSource, subject: string): Result<MatchGroups | null, InvalidPatternError> {
    return this.compile(pattern).map((regex) => {
      const match = withoutGlobal(regex).exec(subject);
      return match === null ? null : toGroups(match);
    });
  }

  replace(
    pattern: PatternSource,
    subject: string,
    replacement: string,
    limit: number
  ): Result<RegexReplacement, InvalidPatternError> {
    return this.compile(pattern).map((regex) => {
      const global = toGlobal(regex);
      let value = '';
      let last = 0;
      let count = 0;

      for (const match of iterate(global, subject)) {
        if (limit > 0 && count >= limit) break;
        value += subject.slice(last, match.index) + expandReplacement(replacement, match, subject);
        last = match.index + match[0].length;
        count++;
      }

      return { value: value + subject.slice(last), count };
    });
  }

  split(pattern: PatternSource, subject: string, limit: number): Result<readonly string[], InvalidPatternError> {
    return this.compile(pattern).map((regex) => {
      const parts: string[] = [];
      let last = 0;

      if (limit === 0 || limit === -1 || limit > 1) {
        for (const match of iterate(toGlobal(regex), subject)) {
          parts.push(subject.slice(last, match.index));
          last = match.index + match[0].length;
          if (limit > 0 && parts.length >= limit - 1) break;
        }
      }

      parts.push(subject.slice(last));
      return parts;
    });
  }

  private compile(pattern: PatternSource): Result<RegExp, InvalidPatternError> {
    if (pattern instanceof RegExp) {
      return ok(pattern);
    }

    const cached = this.cache.get(pattern);
    if (cached !== undefined) {
      // Re-insert so iteration order tracks recency.
      this.cache.delete(pattern);
      this.cache.set(pattern, cached);
      return ok(cached);
    }

    const compiled = parseDelimitedPattern(pattern)
      .andThen(({ body, modifiers }) => toFlags(modifiers).map((flags) => ({ body, flags })))
      .andThen(({ body, flags }) => construct(body, flags))
      .mapErr((reason) => Err.invalidPattern(pattern, reason));

    if (compiled.isErr()) {
      this.options.logger.warn({ pattern, reason: compiled.error.reason }, 'invalid pattern');
      return compiled;
    }

    this.remember(pattern, compiled.value);
    return compiled;
  }

  private remember(pattern: string, regex: RegExp): void {
    const { cacheSize, logger } = this.options;
    if (cacheSize <= 0) return;

    if (this.cache.size >= cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
        logger.debug({ pattern: oldest.value, cacheSize }, 'evicted compiled pattern');
      }
    }

    this.cache.set(pattern, regex);
    logger.debug({ pattern, flags: regex.flags }, 'compiled pattern');
  }
}

function toFlags(modifiers: string): Result<string, string> {
  const flags = new Set<string>();
  for (const modifier of modifiers) {
    const flag = MODIFIER_FLAGS[modifier];
    if (flag === undefined) {
      return err(
        UNSUPPORTED_MODIFIERS.has(modifier)
          ? `Modifier '${modifier}' is not supported by this engine`
          : `Unknown modifier '${modifier}'`
      );
    }
    if (flag !== '') flags.add(flag);
  }
  return ok([...flags].join(''));
}

function construct(body: string, flags: string): Result<RegExp, string> {
  try {
    return ok(new RegExp(body, flags));
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
}

function toGlobal(regex: RegExp): RegExp {
  return new RegExp(regex.source, regex.flags.includes('g') ? regex.flags : `${regex.flags}g`);
}

/** Copy without `g` (keeping `y`), so a single exec starts at 0. */
function withoutGlobal(regex: RegExp): RegExp {
  return new RegExp(regex.source, regex.flags.replace('g', ''));
}

/**
 * All matches of a global RegExp, stepping over empty matches one code unit
 * (one code point under the `u` flag) at a time.
 */
function* iterate(global: RegExp, subject: string): Generator<RegExpExecArray> {
  global.lastIndex = 0;
  let match = global.exec(subject);
  while (match !== null) {
    yield match;
    if (match[0].length === 0) {
      global.lastIndex = advance(subject, global.lastIndex, global.unicode);
    }
    match = global.exec(subject);
  }
}

function advance(subject: string, index: number, unicode: boolean): number {
  if (!unicode || index + 1 >= subject.length) return index + 1;
  const code = subject.charCodeAt(index);
  const isHighSurrogate = code >= 0xd800 && code <= 0xdbff;
  return isHighSurrogate ? index + 2 : index + 1;
}

function toGroups(match: RegExpExecArray): MatchGroups {
  let end = match.length;
  while (end > 1 && match[end - 1] === undefined) end--;

  const groups: string[] = [];
  for (let i = 0; i < end; i++) {
    groups.push(match[i] ?? '');
  }
  return groups;
}
