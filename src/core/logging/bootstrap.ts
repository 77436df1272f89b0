import pino from 'pino';
import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';

/**
 * Bootstrap logger for use BEFORE configuration has been validated.
 *
 * Used by the default context to report an invalid environment; once config
 * is loaded, components log through the configured factory instead.
 */
let _bootstrapLogger: Logger | null = null;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const requested = process.env['IMMUTABLE_STR_LOG_LEVEL']?.toLowerCase() ?? '';
    const level: LogLevel = isLogLevel(requested) ? requested : 'warn';

    _bootstrapLogger = pino(
      {
        name: 'immutable-str',
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
