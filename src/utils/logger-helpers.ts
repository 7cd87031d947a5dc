/**
 * Logger helpers
 *
 * Lazy evaluation of log context objects: context is only built when the
 * level is enabled, which keeps per-message work off the hot path.
 */

import type { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Log `message` with the context returned by `contextBuilder`, building it
 * only when `level` is enabled.
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ id, method }), 'Sent request');
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
