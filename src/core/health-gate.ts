/**
 * Health Gate
 *
 * Bounded polling loop that gates promotion. One GET per interval against
 * `http://localhost:{port}{path}`; the first response whose status equals the
 * expected status ends the loop as healthy. Every other outcome (another
 * status, connection refused while the process boots, a request timeout) is
 * retried until the attempt budget is spent. A process still starting and a
 * process answering unhealthy look the same, so the budget must cover the
 * slowest expected boot.
 */

import type { Logger } from 'pino';
import type { UnhealthyReason } from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

/** Status recorded for attempts that got no HTTP response at all */
export const NO_RESPONSE = 0;

export interface HealthAttempt {
  attempt: number;
  maxAttempts: number;
  status: number;
  elapsedMs: number;
}

export type HealthVerdict =
  | { healthy: true; attempts: number; status: number; elapsedMs: number }
  | { healthy: false; attempts: number; reason: UnhealthyReason; lastStatus: number; elapsedMs: number };

export interface HealthProbeRequest {
  port: number;
  path: string;
  expectedStatus: number;
  /** Attempt budget, one attempt per interval */
  timeoutSeconds: number;
  signal?: AbortSignal;
  /** Checked after each failed attempt; false ends the loop early */
  isAlive?: () => Promise<boolean>;
  onAttempt?: (attempt: HealthAttempt) => void;
}

export interface HealthGateOptions {
  intervalMs?: number;
  requestTimeoutMs?: number;
  host?: string;
  fetch?: typeof fetch;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

const DEFAULT_INTERVAL_MS = 1_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 2_000;

export class HealthGate {
  private readonly intervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly host: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly logger?: Logger;

  constructor(options: HealthGateOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.host = options.host ?? 'localhost';
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger?.child({ component: 'HealthGate' });
  }

  async probe(request: HealthProbeRequest): Promise<HealthVerdict> {
    const url = `http://${this.host}:${request.port}${request.path}`;
    const maxAttempts = request.timeoutSeconds;
    const startedAt = this.now();
    let lastStatus = NO_RESPONSE;

    this.logger?.info({ url, expectedStatus: request.expectedStatus, maxAttempts }, 'Health check started');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (request.signal?.aborted) {
        return this.unhealthy(attempt - 1, 'aborted', lastStatus, startedAt);
      }

      lastStatus = await this.attempt(url);
      const elapsedMs = this.now() - startedAt;
      request.onAttempt?.({ attempt, maxAttempts, status: lastStatus, elapsedMs });
      lazyLog(this.logger, 'debug', () => ({ attempt, maxAttempts, status: lastStatus }), 'Health attempt');

      if (lastStatus === request.expectedStatus) {
        this.logger?.info({ url, attempt, status: lastStatus, elapsedMs }, 'Health check passed');
        return { healthy: true, attempts: attempt, status: lastStatus, elapsedMs };
      }

      if (request.isAlive && !(await request.isAlive())) {
        return this.unhealthy(attempt, 'process-exited', lastStatus, startedAt);
      }

      if (attempt < maxAttempts) {
        const completed = await this.sleep(this.intervalMs, request.signal);
        if (!completed) {
          return this.unhealthy(attempt, 'aborted', lastStatus, startedAt);
        }
      }
    }

    return this.unhealthy(maxAttempts, 'timeout', lastStatus, startedAt);
  }

  private async attempt(url: string): Promise<number> {
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        redirect: 'manual',
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      // Body is ignored; drain it so the socket is released.
      await response.arrayBuffer().catch(() => undefined);
      return response.status;
    } catch {
      return NO_RESPONSE;
    }
  }

  private unhealthy(
    attempts: number,
    reason: UnhealthyReason,
    lastStatus: number,
    startedAt: number
  ): HealthVerdict {
    const elapsedMs = this.now() - startedAt;
    this.logger?.warn({ attempts, reason, lastStatus, elapsedMs }, 'Health check failed');
    return { healthy: false, attempts, reason, lastStatus, elapsedMs };
  }
}
