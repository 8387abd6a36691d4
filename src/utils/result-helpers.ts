/**
 * Result Type Helpers
 *
 * Best-effort steps (old-slot teardown, retention, cache cleanup) never abort
 * a deployment, but their failures must still be reported. They return a
 * Result; `settleBestEffort` logs the Err side and records it as a warning.
 *
 * Usage:
 * ```typescript
 * const outcome = await resultify(store.prune(3, protectedIds));
 * settleBestEffort(outcome, { step: 'prune', logger, warnings });
 * ```
 */

import { Result, Ok, Err } from 'ts-results';
import type { Logger } from 'pino';
import type { DeployWarning } from '../types/release.js';
import { errorMessage } from '../api/errors.js';

/**
 * Helper to convert Promise<T> to Promise<Result<T, Error>>
 */
export async function resultify<T>(promise: Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await promise;
    return Ok(value);
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}

export interface BestEffortContext {
  step: DeployWarning['step'];
  logger?: Logger;
  warnings: DeployWarning[];
  /** Prefix for the warning message, e.g. the command that was run */
  label?: string;
}

/**
 * Log and record the error side of a best-effort result, returning the value
 * (or undefined) so callers can keep going.
 */
export function settleBestEffort<T>(result: Result<T, Error>, context: BestEffortContext): T | undefined {
  if (result.ok) {
    return result.val;
  }

  const message = context.label
    ? `${context.label}: ${errorMessage(result.val)}`
    : errorMessage(result.val);
  context.logger?.warn({ step: context.step, err: result.val }, message);
  context.warnings.push({ step: context.step, message });
  return undefined;
}

// Re-export Result types for convenience
export { Result, Ok, Err };
