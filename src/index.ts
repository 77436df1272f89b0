// Core type
export { ImmutableString, MAX_STRING_LENGTH } from './domain/immutable-string.js';
export type { StringLike, Replacement, RegexMatch, StringFactory } from './domain/immutable-string.js';
export type { Ordering } from './domain/text/ascii-case.js';
export type { FormatArg } from './domain/text/sprintf.js';
export { DEFAULT_TRIM_MASK } from './domain/text/char-mask.js';

// Errors
export * from './errors/index.js';

// Context / configuration
export {
  createStringContext,
  getDefaultStringContext,
  setDefaultStringContext,
  resetDefaultStringContext,
} from './di/string-context.js';
export type { StringContext, StringContextOptions } from './di/string-context.js';
export { loadStrConfig, createValidatedConfig } from './config/str-config.js';
export type { StrConfig, ValidatedStrConfig } from './config/str-config.js';

// Regex engine port + default adapter
export type { RegexEngine, PatternSource, MatchGroups, RegexReplacement } from './runtime/ports/regex-engine.js';
export { JsRegexEngine } from './runtime/adapters/js-regex-engine.js';
export type { JsRegexEngineOptions } from './runtime/adapters/js-regex-engine.js';

// Logging
export { PinoLoggerFactory } from './core/logging/index.js';
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
