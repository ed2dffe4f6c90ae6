/**
 * Logger Helpers
 *
 * Root logger construction and lazy evaluation of log context objects, so
 * per-request context is only built when the level is enabled.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export interface RootLoggerOptions {
  level: LevelWithSilent;
  name?: string;
}

/**
 * Create the process root logger. `LOG_LEVEL` overrides the configured level.
 */
export function createRootLogger(options: RootLoggerOptions): Logger {
  return pino({
    name: options.name ?? 'model-slotswap',
    level: process.env.LOG_LEVEL ?? options.level,
  });
}

/**
 * Lazy log helper that only evaluates context when the level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ method: req.method, path: req.path }), 'HTTP request');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
