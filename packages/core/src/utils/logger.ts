/**
 * pino setup shared by the core and the CLI.
 *
 * Everything is written to stderr; stdout belongs to the scores. Module
 * loggers are children of one root logger built from the loaded config.
 */

import { pino } from 'pino';
import type { Level, Logger, LoggerOptions } from 'pino';
import { isSixDegreesError } from '../errors/base.js';
import type { AppConfig } from './config.js';
import { cfg } from './config.js';

type LoggerSettings = Pick<AppConfig, 'NODE_ENV' | 'LOG_LEVEL' | 'CLI_MODE'>;

/**
 * Tests and the CLI only surface warnings; elsewhere LOG_LEVEL decides.
 */
export function resolveLogLevel(settings: LoggerSettings): Level {
  return settings.NODE_ENV === 'test' || settings.CLI_MODE ? 'warn' : settings.LOG_LEVEL;
}

export function buildLoggerOptions(settings: LoggerSettings): LoggerOptions {
  const options: LoggerOptions = {
    level: resolveLogLevel(settings),
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (settings.NODE_ENV !== 'development' || settings.CLI_MODE) {
    return options;
  }

  return {
    ...options,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid',
        destination: 2,
      },
    },
  };
}

function createRootLogger(settings: LoggerSettings): Logger {
  const options = buildLoggerOptions(settings);
  // pino-pretty opens its own stderr destination
  return options.transport ? pino(options) : pino(options, process.stderr);
}

const rootLogger = createRootLogger(cfg);

/**
 * Child logger tagged with the module it belongs to.
 *
 * @example
 * ```typescript
 * const logger = createModuleLogger('GraphBuilder');
 * logger.debug({ line: 12 }, 'Movie heading');
 * ```
 */
export function createModuleLogger(moduleName: string): Logger {
  return rootLogger.child({ module: moduleName });
}

/**
 * Start timing `operation`; the returned callback logs the elapsed time at
 * info level together with whatever result fields it is given.
 */
export function startTimer(
  logger: Logger,
  operation: string
): (result?: Record<string, unknown>) => void {
  const startedAt = performance.now();

  return (result = {}) => {
    const durationMs = Math.round((performance.now() - startedAt) * 100) / 100;
    logger.info({ operation, durationMs, ...result }, `${operation} took ${durationMs}ms`);
  };
}

/**
 * Log an error at error level. Our own errors are logged in their
 * serialised form so module, operation and context are kept.
 */
export function logError(
  logger: Logger,
  error: Error,
  context: Record<string, unknown> = {}
): void {
  const details = isSixDegreesError(error)
    ? error.toJSON()
    : { name: error.name, message: error.message, stack: error.stack, cause: error.cause };

  logger.error({ ...context, error: details }, error.message);
}
