/**
 * Release Orchestrator
 *
 * Drives one deployment attempt through
 * resolving → staging → starting → health_checking → promoting | rolling_back
 * → settling → done.
 *
 * Nothing observable to production changes before `promoting`: staging and
 * starting only touch the idle slot, and a failed health gate never reaches
 * the traffic switch. After promotion the order is fixed (proxy verified,
 * pointer written, grace delay, old slot stopped), and every step past the
 * pointer write is best-effort: failures become warnings in the report and
 * turn a clean exit into exit code 2.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { DeployEvents } from '../api/events.js';
import { HealthTimeoutError, toDeployError, type DeployError } from '../api/errors.js';
import {
  DeployExitCode,
  DeployPhase,
  type AttemptOutcome,
  type DeploymentAttempt,
  type DeploymentReport,
  type DeployWarning,
  type Release,
  type ReleaseSource,
} from '../types/release.js';
import type { LivePointerRecord } from '../types/slot.js';
import type { ProcessSupervisor } from '../supervisor/process-supervisor.js';
import type { DiskGuard } from '../services/disk-guard.js';
import type { HealthGate } from './health-gate.js';
import type { ReleaseStore } from './release-store.js';
import type { SlotResolver } from './slot-resolver.js';
import type { TrafficSwitch } from './traffic-switch.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import { resultify, settleBestEffort, type Result } from '../utils/result-helpers.js';

/** Warning steps that happen after traffic has moved */
const POST_PROMOTION_STEPS: ReadonlySet<DeployWarning['step']> = new Set(['settle', 'prune', 'persist']);

/** Phases after which the target slot may hold a process that must go */
const ROLLBACK_PHASES: ReadonlySet<DeployPhase> = new Set([
  DeployPhase.STARTING,
  DeployPhase.HEALTH_CHECKING,
  DeployPhase.PROMOTING,
]);

export interface OrchestratorConfig {
  healthPath: string;
  expectedStatus: number;
  timeoutSeconds: number;
  keepReleases: number;
  graceDelayMs: number;
  /** Force-stop a target that failed its health gate */
  stopFailedTarget: boolean;
  logger?: Logger;
}

export interface OrchestratorDependencies {
  resolver: Pick<SlotResolver, 'resolve'>;
  store: Pick<ReleaseStore, 'stage' | 'get' | 'bindSlot' | 'boundReleaseId' | 'prune'>;
  supervisor: ProcessSupervisor;
  health: Pick<HealthGate, 'probe'>;
  traffic: Pick<TrafficSwitch, 'cutover'>;
  /** Free-space check before staging a new artifact */
  diskGuard?: Pick<DiskGuard, 'ensureSpace'>;
  sleep?: Sleep;
  /** Time source override (useful for testing) */
  now?: () => number;
}

export interface DeployOptions {
  /** Cancels the health gate and the grace delay */
  signal?: AbortSignal;
}

/**
 * Mutable state for a single run.
 */
interface AttemptContext {
  attempt: DeploymentAttempt;
  warnings: DeployWarning[];
  phase?: DeployPhase;
  promoted: boolean;
}

export class ReleaseOrchestrator extends EventEmitter<DeployEvents> {
  private readonly config: OrchestratorConfig;
  private readonly deps: OrchestratorDependencies;
  private readonly logger?: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(config: OrchestratorConfig, dependencies: OrchestratorDependencies) {
    super();
    this.config = config;
    this.deps = dependencies;
    this.logger = config.logger?.child({ component: 'ReleaseOrchestrator' });
    this.sleep = dependencies.sleep ?? defaultSleep;
    this.now = dependencies.now ?? Date.now;
  }

  /**
   * Run one deployment attempt. Failures after slot resolution are reported
   * in the returned report, never thrown.
   *
   * @throws {LivePointerError} when the live pointer cannot be read
   */
  public async deploy(source: ReleaseSource, options: DeployOptions = {}): Promise<DeploymentReport> {
    const startedAt = this.now();
    const attemptId = randomUUID();
    const phases: DeploymentAttempt['phases'] = [{ phase: DeployPhase.RESOLVING, startedAt }];
    this.emit('phase', { attemptId, phase: DeployPhase.RESOLVING, timestamp: startedAt });

    const resolution = await this.deps.resolver.resolve();
    const ctx: AttemptContext = {
      attempt: { id: attemptId, source: resolution.current, target: resolution.target, phases },
      warnings: [],
      phase: DeployPhase.RESOLVING,
      promoted: false,
    };

    this.logger?.info(
      { attemptId, source, from: resolution.current.label, to: resolution.target.label },
      'Deployment started'
    );

    let outcome: AttemptOutcome;
    let error: DeployError | undefined;

    try {
      outcome = await this.run(ctx, source, options.signal);
    } catch (caught) {
      error = toDeployError(caught);
      outcome = error.code === 'Cancelled' ? 'aborted' : this.failedOutcome(ctx);
      this.logger?.error({ attemptId, phase: ctx.phase, err: error }, 'Deployment attempt failed');
      await this.rollBack(ctx, error);
    }

    await this.retain(ctx);
    this.enterPhase(ctx, DeployPhase.DONE);
    this.closePhase(ctx);

    ctx.attempt.outcome = outcome;
    const report: DeploymentReport = {
      attempt: ctx.attempt,
      outcome,
      exitCode: this.exitCodeFor(outcome, ctx.warnings),
      warnings: ctx.warnings,
      durationMs: this.now() - startedAt,
    };
    if (error) {
      report.error = error.toObject();
    }

    this.logger?.info(
      { attemptId, outcome, exitCode: report.exitCode, warnings: ctx.warnings.length, durationMs: report.durationMs },
      'Deployment finished'
    );
    this.emit('completed', { report });
    return report;
  }

  private async run(ctx: AttemptContext, source: ReleaseSource, signal?: AbortSignal): Promise<AttemptOutcome> {
    const { target } = ctx.attempt;

    this.enterPhase(ctx, DeployPhase.STAGING);
    const release = await this.stage(ctx, source);
    await this.deps.store.bindSlot(target, release);
    ctx.attempt.release = release;

    this.enterPhase(ctx, DeployPhase.STARTING);
    await this.deps.supervisor.start(target, release);

    this.enterPhase(ctx, DeployPhase.HEALTH_CHECKING);
    const verdict = await this.deps.health.probe({
      port: target.port,
      path: this.config.healthPath,
      expectedStatus: this.config.expectedStatus,
      timeoutSeconds: this.config.timeoutSeconds,
      signal,
      isAlive: () => this.deps.supervisor.isRunning(target),
      onAttempt: (attempt) =>
        this.emit('health_attempt', { attemptId: ctx.attempt.id, slot: target.id, port: target.port, ...attempt }),
    });

    if (!verdict.healthy) {
      throw new HealthTimeoutError(target.port, verdict.attempts, verdict.reason, verdict.lastStatus);
    }

    this.enterPhase(ctx, DeployPhase.PROMOTING);
    const pointer = await this.deps.traffic.cutover(target, release, ctx.attempt.source);
    ctx.promoted = true;
    this.emitPromoted(ctx, release, pointer);

    this.enterPhase(ctx, DeployPhase.SETTLING);
    await this.settle(ctx, signal);

    return 'success';
  }

  private async stage(ctx: AttemptContext, source: ReleaseSource): Promise<Release> {
    if (source.kind === 'release') {
      return this.deps.store.get(source.id);
    }
    if (this.deps.diskGuard) {
      await this.deps.diskGuard.ensureSpace(ctx.warnings);
    }
    return this.deps.store.stage(source.path);
  }

  /**
   * Wait out in-flight requests on the old slot, then stop it.
   */
  private async settle(ctx: AttemptContext, signal?: AbortSignal): Promise<void> {
    const previous = ctx.attempt.source;
    const waited = await this.sleep(this.config.graceDelayMs, signal);

    if (!waited) {
      this.warn(ctx, 'settle', `Grace delay interrupted; ${previous.label} left running on port ${previous.port}`);
    } else {
      await this.settleStep(ctx, 'settle', this.deps.supervisor.stop(previous), `stop ${previous.label}`);
    }

    await this.settleStep(ctx, 'persist', this.deps.supervisor.persist(), 'persist process list');
  }

  /**
   * Give up on the target slot. Only reached before promotion; the live slot
   * and pointer are untouched. A target the proxy could not be moved off is
   * left running.
   */
  private async rollBack(ctx: AttemptContext, error: DeployError): Promise<void> {
    const { phase } = ctx;
    const { target } = ctx.attempt;
    if (ctx.promoted || !phase || !ROLLBACK_PHASES.has(phase)) {
      return;
    }
    // A cancelled attempt leaves the target running; the next start replaces it.
    if (error.code === 'Cancelled') {
      return;
    }

    this.enterPhase(ctx, DeployPhase.ROLLING_BACK);

    let targetStopped = false;
    if (phase === DeployPhase.PROMOTING && error.details?.proxyOnTarget === true) {
      this.warn(ctx, 'rollback', `Proxy still routes to ${target.label} on port ${target.port}; target left running`);
    } else if (this.config.stopFailedTarget || phase !== DeployPhase.HEALTH_CHECKING) {
      const stopped = await resultify(this.deps.supervisor.stop(target, { force: true }));
      targetStopped = stopped.ok;
      this.record(ctx, stopped, 'rollback', `stop ${target.label}`);
    } else {
      this.warn(ctx, 'rollback', `Unhealthy target ${target.label} left running on port ${target.port}`);
    }

    this.emit('rolled_back', {
      attemptId: ctx.attempt.id,
      slot: target.id,
      port: target.port,
      reason: error.message,
      targetStopped,
      timestamp: this.now(),
    });
  }

  /**
   * Retention pass. Releases bound to either slot are protected.
   */
  private async retain(ctx: AttemptContext): Promise<void> {
    const { source, target } = ctx.attempt;
    const protectedIds = new Set<string>();

    for (const slot of [source, target]) {
      const bound = await resultify(this.deps.store.boundReleaseId(slot));
      if (!bound.ok) {
        this.record(ctx, bound, 'prune', `read ${slot.label} binding`);
        return;
      }
      if (bound.val !== null) {
        protectedIds.add(bound.val);
      }
    }

    await this.settleStep(ctx, 'prune', this.deps.store.prune(this.config.keepReleases, protectedIds), 'prune');
  }

  private async settleStep<T>(
    ctx: AttemptContext,
    step: DeployWarning['step'],
    operation: Promise<T>,
    label: string
  ): Promise<void> {
    this.record(ctx, await resultify(operation), step, label);
  }

  private record<T>(ctx: AttemptContext, result: Result<T, Error>, step: DeployWarning['step'], label: string): void {
    const before = ctx.warnings.length;
    settleBestEffort(result, { step, logger: this.logger, warnings: ctx.warnings, label });
    for (const warning of ctx.warnings.slice(before)) {
      this.emit('cleanup_warning', { attemptId: ctx.attempt.id, warning });
    }
  }

  private warn(ctx: AttemptContext, step: DeployWarning['step'], message: string): void {
    const warning: DeployWarning = { step, message };
    this.logger?.warn({ step }, message);
    ctx.warnings.push(warning);
    this.emit('cleanup_warning', { attemptId: ctx.attempt.id, warning });
  }

  private emitPromoted(ctx: AttemptContext, release: Release, pointer: LivePointerRecord): void {
    this.logger?.info(
      { attemptId: ctx.attempt.id, slot: ctx.attempt.target.label, releaseId: release.id, version: pointer.version },
      'Traffic switched to new release'
    );
    this.emit('promoted', { attemptId: ctx.attempt.id, release, pointer, timestamp: this.now() });
  }

  private enterPhase(ctx: AttemptContext, phase: DeployPhase): void {
    const previous = ctx.phase;
    this.closePhase(ctx);
    const timestamp = this.now();
    ctx.attempt.phases.push({ phase, startedAt: timestamp });
    ctx.phase = phase;
    this.emit('phase', { attemptId: ctx.attempt.id, phase, previous, timestamp });
  }

  private closePhase(ctx: AttemptContext): void {
    const current = ctx.attempt.phases[ctx.attempt.phases.length - 1];
    if (current && current.durationMs === undefined) {
      current.durationMs = this.now() - current.startedAt;
    }
  }

  private failedOutcome(ctx: AttemptContext): AttemptOutcome {
    return ctx.phase === DeployPhase.HEALTH_CHECKING ? 'health-failed' : 'aborted';
  }

  private exitCodeFor(outcome: AttemptOutcome, warnings: readonly DeployWarning[]): DeployExitCode {
    if (outcome !== 'success') {
      return DeployExitCode.ABORTED;
    }
    return warnings.some((w) => POST_PROMOTION_STEPS.has(w.step))
      ? DeployExitCode.CLEANUP_FAILED
      : DeployExitCode.PROMOTED;
  }
}
