/**
 * Structured logging via pino.
 *
 * The base logger starts silent: the terminal UI owns stdout, so logs are only
 * written once `configureLogger` points them at a file.
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  /** Destination file. Without one the logger stays silent. */
  file?: string;
}

function baseOptions(level: LogLevel): LoggerOptions {
  return {
    name: 'pkglist',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: 'msg',
    serializers: {
      err: pino.stdSerializers.err,
    },
  };
}

let baseLogger: Logger = pino(baseOptions('silent'));

/** Replace the base logger. Child loggers created earlier keep their old parent. */
export function configureLogger(config: LoggerConfig): Logger {
  if (!config.file) {
    baseLogger = pino(baseOptions('silent'));
    return baseLogger;
  }
  const destination = pino.destination({ dest: config.file, mkdir: true, sync: false });
  baseLogger = pino(baseOptions(config.level ?? 'info'), destination);
  return baseLogger;
}

export function getLogger(): Logger {
  return baseLogger;
}

/**
 * Child logger tagged with a component name.
 *
 * @example
 * const log = createChildLogger('reconciler');
 * log.debug({ added: 2 }, 'list update applied');
 */
export function createChildLogger(component: string, context: Record<string, unknown> = {}): Logger {
  return baseLogger.child({ component, ...context });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export type { Logger } from 'pino';
