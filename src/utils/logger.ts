import pino, { Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Root structured logger. Writes to stderr so stdout stays free for
 * CLI results.
 */
export function createLogger(options: { level: LogLevel; name?: string }): Logger {
  return pino(
    {
      level: options.level,
      name: options.name ?? 'parcel-ledger',
      base: {
        pid: process.pid
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ dest: 2, sync: true })
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
