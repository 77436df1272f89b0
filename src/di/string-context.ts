import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';
import type { ValidatedStrConfig } from '../config/str-config.js';
import { createValidatedConfig, loadStrConfig } from '../config/str-config.js';
import { formatStrError } from '../errors/formatter.js';
import type { RegexEngine } from '../runtime/ports/regex-engine.js';
import { JsRegexEngine } from '../runtime/adapters/js-regex-engine.js';

/**
 * Collaborators every ImmutableString carries. Derived instances share their
 * receiver's context.
 */
export interface StringContext {
  readonly regex: RegexEngine;
  readonly logger: Logger;
}

export interface StringContextOptions {
  readonly config?: ValidatedStrConfig;
  readonly loggerFactory?: ILoggerFactory;
  readonly regex?: RegexEngine;
}

export function createStringContext(options: StringContextOptions = {}): StringContext {
  const config = options.config ?? createValidatedConfig();
  const loggers = options.loggerFactory ?? new PinoLoggerFactory(config.logging.level);

  return {
    regex:
      options.regex ??
      new JsRegexEngine({ cacheSize: config.patterns.cacheSize, logger: loggers.create('JsRegexEngine') }),
    logger: loggers.create('ImmutableString'),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONTEXT (composition root for the static factories)
// ═══════════════════════════════════════════════════════════════════════════

let defaultContext: StringContext | null = null;

/**
 * Context built from `process.env` on first use. An invalid environment is
 * reported through the bootstrap logger and replaced by the defaults.
 */
export function getDefaultStringContext(): StringContext {
  if (!defaultContext) {
    const config = loadStrConfig({ env: process.env }).match(
      (valid) => valid,
      (error) => {
        createBootstrapLogger('string-context').warn(
          { issues: error.issues },
          `${formatStrError(error)}\nFalling back to default configuration`
        );
        return createValidatedConfig();
      }
    );
    defaultContext = createStringContext({ config });
  }
  return defaultContext;
}

export function setDefaultStringContext(context: StringContext): void {
  defaultContext = context;
}

/** Tests only: forget the default so the next call rebuilds it from the environment. */
export function resetDefaultStringContext(): void {
  defaultContext = null;
}
