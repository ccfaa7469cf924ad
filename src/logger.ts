// Logger factory
//
// Library code never creates a global logger: callers pass one in, and
// everything defaults to a silent instance.

import { pino, type Logger, type LevelWithSilent } from 'pino';

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Human-readable output through pino-pretty (development only) */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? 'info',
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

/** Logger that drops everything. Default for operators built without one. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type { Logger };
