/**
 * Root logger factory.
 *
 * One pino instance is built by the entry point; components receive it
 * through their options and derive children.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';

export function createRootLogger(level: LevelWithSilent = DEFAULT_LOG_LEVEL, name = 'policy-serving'): Logger {
  return pino({
    name,
    level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
