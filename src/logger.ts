import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export type LogLevel = pino.LevelWithSilent;

export interface LoggerOptions {
  level?: LogLevel;
  /** Human-readable output through pino-pretty; keep off in production */
  pretty?: boolean;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', pretty = false, name } = options;

  const pinoOptions: pino.LoggerOptions = { level };

  if (name) {
    pinoOptions.name = name;
  }

  if (pretty) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(pinoOptions);
}

/** Logger that discards everything; default for library use and tests */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
