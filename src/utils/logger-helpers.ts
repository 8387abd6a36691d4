/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects: the context builder only runs
 * when the level is enabled, so per-attempt debug logging in polling loops
 * costs nothing at the default level.
 */

import type { Logger, Level } from 'pino';

type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * @example
 * lazyLog(logger, 'debug', () => ({ attempt, status }), 'Health attempt');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: Level,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
