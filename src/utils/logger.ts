/**
 * Root logger factory.
 *
 * Components accept an optional pino Logger and derive a child bound to
 * their component name, so one root created here carries the configured
 * level through the whole run.
 */

import { pino, type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

/**
 * @param destination - Defaults to stdout; the CLI logs to stderr so reports stay parseable
 */
export function createLogger(level: LevelWithSilent = 'info', destination?: DestinationStream): Logger {
  const options = {
    name: 'slotswap',
    level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
