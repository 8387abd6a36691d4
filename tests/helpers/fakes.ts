/**
 * In-memory stand-ins for the process supervisor and reverse proxy.
 */

import type { Release } from '../../src/types/release.js';
import type { SlotBinding, SlotId } from '../../src/types/slot.js';
import type {
  ProcessHandle,
  ProcessSupervisor,
  StopOptions,
} from '../../src/supervisor/process-supervisor.js';
import type { ProxyBackend, ReverseProxy } from '../../src/proxy/reverse-proxy.js';
import { ProxyReloadError, SupervisorError } from '../../src/api/errors.js';

export type SupervisorCall =
  | { action: 'start'; slot: SlotId; releaseId: string }
  | { action: 'stop'; slot: SlotId; force: boolean }
  | { action: 'persist' };

export class FakeSupervisor implements ProcessSupervisor {
  readonly calls: SupervisorCall[] = [];
  readonly running = new Map<SlotId, string>();
  startError: Error | null = null;
  persistError: Error | null = null;
  readonly stopErrors = new Map<SlotId, Error>();
  /** Slots whose process dies right after start */
  readonly crashing = new Set<SlotId>();

  async start(slot: SlotBinding, release: Release): Promise<ProcessHandle> {
    this.calls.push({ action: 'start', slot: slot.id, releaseId: release.id });
    if (this.startError) {
      throw this.startError;
    }
    if (!this.crashing.has(slot.id)) {
      this.running.set(slot.id, release.id);
    }
    return {
      name: `app-${slot.label}`,
      slot: slot.id,
      port: slot.port,
      releaseId: release.id,
      startedAt: '2025-01-01T12:00:00.000Z',
    };
  }

  async stop(slot: SlotBinding, options: StopOptions = {}): Promise<void> {
    this.calls.push({ action: 'stop', slot: slot.id, force: options.force ?? false });
    const error = this.stopErrors.get(slot.id);
    if (error) {
      throw error;
    }
    this.running.delete(slot.id);
  }

  async isRunning(slot: SlotBinding): Promise<boolean> {
    return this.running.has(slot.id);
  }

  async persist(): Promise<void> {
    this.calls.push({ action: 'persist' });
    if (this.persistError) {
      throw this.persistError;
    }
  }

  stopsOf(slot: SlotId): Array<{ force: boolean }> {
    return this.calls.flatMap((call) => (call.action === 'stop' && call.slot === slot ? [{ force: call.force }] : []));
  }
}

export function supervisorFailure(message: string): SupervisorError {
  return new SupervisorError('app-test', message);
}

export class FakeProxy implements ReverseProxy {
  readonly driver = 'fake';
  readonly applied: ProxyBackend[] = [];
  port: number | null;
  /** Rejects the next N apply calls */
  failures = 0;
  /** Rejects every apply against these ports */
  readonly failingPorts = new Set<number>();

  constructor(initialPort: number | null = null) {
    this.port = initialPort;
  }

  async apply(backend: ProxyBackend): Promise<void> {
    this.applied.push(backend);
    if (this.failures > 0 || this.failingPorts.has(backend.port)) {
      this.failures = Math.max(0, this.failures - 1);
      throw new ProxyReloadError('nginx test failed: configuration invalid');
    }
    this.port = backend.port;
  }

  async currentPort(): Promise<number | null> {
    return this.port;
  }
}
