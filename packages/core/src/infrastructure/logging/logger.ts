import pino, { stdTimeFunctions } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface CreateLoggerOptions {
  readonly level?: string;
  readonly name?: string;
  /** Stream to write to instead of stdout. */
  readonly destination?: DestinationStream;
}

/** Root structured logger. Components derive children with `logger.child({ component })`. */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? 'info',
    base: undefined,
    timestamp: stdTimeFunctions.isoTime,
    ...(options.name !== undefined ? { name: options.name } : {}),
  };
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

/** Logger that discards everything. Default for components built without one. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
