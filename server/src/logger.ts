import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  format?: 'json' | 'pretty';
}

export function createLogger({ level = 'info', format = 'json' }: LoggerOptions = {}): Logger {
  return pino({
    level,
    base: { service: 'eater-ingest' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(format === 'pretty' && {
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      },
    }),
  });
}

/** Logger that drops everything; used where a caller does not pass one. */
export const silentLogger: Logger = pino({ level: 'silent' });
