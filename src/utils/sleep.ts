/**
 * Abortable delay.
 */

import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

/**
 * Resolves `true` after `ms`, or `false` as soon as `signal` aborts.
 */
export const sleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) {
    return false;
  }
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return false;
    }
    throw error;
  }
};
