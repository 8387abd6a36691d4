import { describe, it, expect, afterEach } from 'vitest';
import { createServer, type Server } from 'node:http';
import { HealthGate, NO_RESPONSE, type HealthAttempt } from '../../../src/core/health-gate.js';
import type { Sleep } from '../../../src/utils/sleep.js';
import { silentLogger } from '../../helpers/fixtures.js';

type ScriptedResponse = number | 'refused';

function scriptedFetch(script: ScriptedResponse[], fallback: ScriptedResponse): { fetch: typeof fetch; urls: string[] } {
  const urls: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    urls.push(String(input));
    const next = script.shift() ?? fallback;
    if (next === 'refused') {
      throw new TypeError('fetch failed');
    }
    return new Response('body', { status: next });
  };
  return { fetch: fetchImpl, urls };
}

function recordingSleep(result = true): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
      return result;
    },
  };
}

describe('HealthGate', () => {
  it('passes on the first expected status after earlier failures', async () => {
    const { fetch, urls } = scriptedFetch(['refused', 503, 200], 200);
    const { sleep, delays } = recordingSleep();
    const attempts: HealthAttempt[] = [];
    const gate = new HealthGate({ fetch, sleep, logger: silentLogger });

    const verdict = await gate.probe({
      port: 3001,
      path: '/api/health',
      expectedStatus: 200,
      timeoutSeconds: 30,
      onAttempt: (attempt) => attempts.push(attempt),
    });

    expect(verdict).toMatchObject({ healthy: true, attempts: 3, status: 200 });
    expect(attempts.map((a) => a.status)).toEqual([NO_RESPONSE, 503, 200]);
    expect(attempts.map((a) => a.maxAttempts)).toEqual([30, 30, 30]);
    expect(delays).toEqual([1000, 1000]);
    expect(urls).toEqual([
      'http://localhost:3001/api/health',
      'http://localhost:3001/api/health',
      'http://localhost:3001/api/health',
    ]);
  });

  it('gives up after the attempt budget when the status never matches', async () => {
    const { fetch } = scriptedFetch([], 503);
    const { sleep, delays } = recordingSleep();
    const attempts: HealthAttempt[] = [];
    const gate = new HealthGate({ fetch, sleep, intervalMs: 250, logger: silentLogger });

    const verdict = await gate.probe({
      port: 3001,
      path: '/api/health',
      expectedStatus: 200,
      timeoutSeconds: 10,
      onAttempt: (attempt) => attempts.push(attempt),
    });

    expect(verdict).toMatchObject({ healthy: false, attempts: 10, reason: 'timeout', lastStatus: 503 });
    expect(attempts).toHaveLength(10);
    expect(delays).toEqual(Array.from({ length: 9 }, () => 250));
  });

  it('requires an exact status match', async () => {
    const { fetch } = scriptedFetch([204], 204);
    const { sleep } = recordingSleep();
    const gate = new HealthGate({ fetch, sleep });

    const verdict = await gate.probe({ port: 3000, path: '/health', expectedStatus: 200, timeoutSeconds: 2 });

    expect(verdict).toMatchObject({ healthy: false, reason: 'timeout', lastStatus: 204 });
  });

  it('stops early when the process has exited', async () => {
    const { fetch } = scriptedFetch([], 'refused');
    const { sleep, delays } = recordingSleep();
    const gate = new HealthGate({ fetch, sleep });

    const verdict = await gate.probe({
      port: 3001,
      path: '/api/health',
      expectedStatus: 200,
      timeoutSeconds: 30,
      isAlive: async () => false,
    });

    expect(verdict).toMatchObject({ healthy: false, attempts: 1, reason: 'process-exited', lastStatus: 0 });
    expect(delays).toEqual([]);
  });

  it('does not consult isAlive once healthy', async () => {
    const { fetch } = scriptedFetch([200], 200);
    let checks = 0;
    const gate = new HealthGate({ fetch, sleep: recordingSleep().sleep });

    await gate.probe({
      port: 3001,
      path: '/api/health',
      expectedStatus: 200,
      timeoutSeconds: 5,
      isAlive: async () => {
        checks++;
        return true;
      },
    });

    expect(checks).toBe(0);
  });

  it('ends as aborted when the signal has already fired', async () => {
    const { fetch, urls } = scriptedFetch([], 200);
    const controller = new AbortController();
    controller.abort();
    const gate = new HealthGate({ fetch, sleep: recordingSleep().sleep });

    const verdict = await gate.probe({
      port: 3001,
      path: '/api/health',
      expectedStatus: 200,
      timeoutSeconds: 5,
      signal: controller.signal,
    });

    expect(verdict).toMatchObject({ healthy: false, attempts: 0, reason: 'aborted' });
    expect(urls).toEqual([]);
  });

  it('ends as aborted when the wait between attempts is interrupted', async () => {
    const { fetch } = scriptedFetch([], 503);
    const gate = new HealthGate({ fetch, sleep: recordingSleep(false).sleep });

    const verdict = await gate.probe({ port: 3001, path: '/api/health', expectedStatus: 200, timeoutSeconds: 5 });

    expect(verdict).toMatchObject({ healthy: false, attempts: 1, reason: 'aborted', lastStatus: 503 });
  });

  describe('against a local HTTP server', () => {
    let server: Server | undefined;

    afterEach(async () => {
      const running = server;
      server = undefined;
      if (running) {
        await new Promise<void>((resolve) => running.close(() => resolve()));
      }
    });

    it('polls until the server reports healthy', async () => {
      let requests = 0;
      server = createServer((req, res) => {
        requests++;
        res.statusCode = req.url === '/api/health' && requests >= 3 ? 200 : 503;
        res.end();
      });
      const listening = server;
      await new Promise<void>((resolve) => listening.listen(0, '127.0.0.1', () => resolve()));
      const address = listening.address();
      if (address === null || typeof address === 'string') {
        throw new Error('server has no port');
      }

      const gate = new HealthGate({ host: '127.0.0.1', intervalMs: 10, logger: silentLogger });
      const verdict = await gate.probe({
        port: address.port,
        path: '/api/health',
        expectedStatus: 200,
        timeoutSeconds: 20,
      });

      expect(verdict).toMatchObject({ healthy: true, attempts: 3, status: 200 });
      expect(requests).toBe(3);
    });
  });
});
