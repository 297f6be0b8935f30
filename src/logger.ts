import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export interface LoggerOptions {
  level: LevelWithSilent;
  pretty: boolean;
}

/**
 * Root pino logger. The admin HTTP server reuses this instance, so the
 * router, services and providers all log through the same stream.
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    transport: options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}
