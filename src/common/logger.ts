/**
 * Logger contract shared by every service, plus the pino-backed factory.
 *
 * Services never import pino directly; they receive a `Logger` so tests can
 * pass a plain object of spies.
 */

import pino from 'pino';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug: (obj: object, msg?: string) => void;
}

export interface LoggerOptions {
  level?: string;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'fed-monitor',
    level: options.level ?? 'info',
    base: { app: 'fed-monitor' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ['*.apiKey', '*.api_key', '*.botToken', '*.token'],
  });
}

/**
 * Logger that drops everything. Used where a caller opts out of logging.
 */
export const noopLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
