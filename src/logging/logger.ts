/**
 * Logging for lintkit.
 *
 * One pino root logger per process; components take a child logger tagged
 * with their name.
 */

import { pino, type Logger } from 'pino';

export type { Logger };

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface LoggerOptions {
  /** Level (default: LINTKIT_LOG_LEVEL, then 'info') */
  level?: LogLevel;
  /** Logger name (default: 'lintkit') */
  name?: string;
}

/**
 * Create a root logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'lintkit',
    level: options.level ?? process.env.LINTKIT_LOG_LEVEL ?? 'info',
  });
}

/**
 * A logger that writes nothing. Used as the default in library entry
 * points and in tests.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Child logger for one component.
 */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
