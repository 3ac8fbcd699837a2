import { pino } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function envLevel(): LogLevel {
  return LOG_LEVELS.find((level) => level === process.env.LOG_LEVEL) ?? 'info';
}

/**
 * Process-wide structured logger. Call sites pass bindings first and the
 * message second: `logger.info({ subsystem }, 'Cycle finished')`.
 *
 * Starts at `LOG_LEVEL` from the environment; the entry point applies the
 * validated config through `setLogLevel` once it has loaded.
 */
export const logger = pino({
  level: envLevel(),
  base: { service: 'patchwatch' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
