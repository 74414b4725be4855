import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger } from 'pino';

export type CreateLoggerOptions = {
  name: string;
  level?: string;
  /** Defaults to stdout. */
  destination?: DestinationStream;
};

export function createLogger(options: CreateLoggerOptions): Logger {
  const loggerOptions = {
    name: options.name,
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  };
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
