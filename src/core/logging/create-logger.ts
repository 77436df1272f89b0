import pino from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';

/**
 * Create the root pino logger instance.
 *
 * - Sync output to stderr (stdout belongs to the host application)
 * - JSON format for machine parsing
 */
function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      name: 'immutable-str',
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers off a single root.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
