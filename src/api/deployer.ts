/**
 * Deployer
 *
 * Composition root: builds every component from one validated configuration
 * and exposes the operator-facing operations (deploy, redeploy, status,
 * prune, stop).
 */

import type { Logger } from 'pino';
import type { DeployConfig } from '../types/schemas/config.js';
import type { DeploymentReport, PruneResult } from '../types/release.js';
import type { LivePointerRecord, SlotBinding, SlotId } from '../types/slot.js';
import { SLOT_IDS } from '../types/slot.js';
import { resolveLayout, type DeployLayout } from '../config/layout.js';
import { LivePointer } from '../core/live-pointer.js';
import { SlotResolver } from '../core/slot-resolver.js';
import { ReleaseStore } from '../core/release-store.js';
import { HealthGate } from '../core/health-gate.js';
import { TrafficSwitch } from '../core/traffic-switch.js';
import { ReleaseOrchestrator, type DeployOptions } from '../core/orchestrator.js';
import { NginxProxy } from '../proxy/nginx-proxy.js';
import { NoopProxy, type ReverseProxy } from '../proxy/reverse-proxy.js';
import { Pm2Supervisor } from '../supervisor/pm2-supervisor.js';
import { processName, type ProcessSupervisor, type StopOptions } from '../supervisor/process-supervisor.js';
import { DiskGuard, type StatFs } from '../services/disk-guard.js';
import { instrumentOrchestrator } from '../telemetry/deploy-metrics.js';
import type { CommandRunner } from '../utils/command-runner.js';
import type { Sleep } from '../utils/sleep.js';
import { resultify } from '../utils/result-helpers.js';
import { SupervisorError } from './errors.js';

export interface DeployerOptions {
  config: DeployConfig;
  logger?: Logger;
  runner?: CommandRunner;
  fetch?: typeof fetch;
  sleep?: Sleep;
  clock?: () => Date;
  statfs?: StatFs;
  /** Replace the configured proxy driver */
  proxy?: ReverseProxy;
  /** Replace the configured supervisor driver */
  supervisor?: ProcessSupervisor;
}

export interface SlotStatus {
  id: SlotId;
  label: string;
  port: number;
  live: boolean;
  releaseId: string | null;
  /** null when the supervisor could not be queried */
  running: boolean | null;
}

export interface DeployerStatus {
  pointer: LivePointerRecord | null;
  proxyPort: number | null;
  slots: SlotStatus[];
  releases: string[];
}

export interface StopSlotOptions extends StopOptions {
  /** Permit stopping the slot that serves production */
  allowLive?: boolean;
}

export class Deployer {
  readonly config: DeployConfig;
  readonly layout: DeployLayout;
  readonly pointer: LivePointer;
  readonly store: ReleaseStore;
  readonly supervisor: ProcessSupervisor;
  readonly proxy: ReverseProxy;
  readonly orchestrator: ReleaseOrchestrator;
  private readonly logger?: Logger;

  constructor(options: DeployerOptions) {
    const { config, logger, runner, clock } = options;
    this.config = config;
    this.logger = logger;
    this.layout = resolveLayout(config);

    this.pointer = new LivePointer({
      file: this.layout.livePointerFile,
      currentAlias: this.layout.currentAlias,
      slots: this.layout.slots,
      logger,
      now: clock,
    });

    this.store = new ReleaseStore({
      releasesDir: this.layout.releasesDir,
      sharedEnvFile: this.layout.sharedEnvFile,
      installCommand: config.release.install_command,
      installTimeoutMs: config.release.install_timeout_ms,
      runner,
      now: clock,
      logger,
    });

    this.supervisor =
      options.supervisor ??
      new Pm2Supervisor({
        appName: config.app.name,
        pm2Bin: config.supervisor.pm2_bin,
        ecosystemDir: this.layout.baseDir,
        logDir: this.layout.logDir,
        maxMemoryRestart: config.supervisor.max_memory_restart,
        entrypoints: config.supervisor.entrypoints,
        runner,
        now: clock,
        logger,
      });

    this.proxy = options.proxy ?? this.createProxy(runner);

    const diskGuard =
      config.maintenance.min_free_space_gb > 0
        ? new DiskGuard({
            path: this.layout.baseDir,
            minFreeGb: config.maintenance.min_free_space_gb,
            cleanupCommands: config.maintenance.cleanup_commands,
            prune: () => this.prune(),
            runner,
            statfs: options.statfs,
            logger,
          })
        : undefined;

    this.orchestrator = new ReleaseOrchestrator(
      {
        healthPath: config.health.path,
        expectedStatus: config.health.expected_status,
        timeoutSeconds: config.health.timeout_seconds,
        keepReleases: config.release.keep_releases,
        graceDelayMs: config.settle.grace_delay_ms,
        stopFailedTarget: config.health.stop_failed_target,
        logger,
      },
      {
        resolver: new SlotResolver(this.pointer, this.layout.slots, logger),
        store: this.store,
        supervisor: this.supervisor,
        health: new HealthGate({
          intervalMs: config.health.interval_ms,
          requestTimeoutMs: config.health.request_timeout_ms,
          fetch: options.fetch,
          sleep: options.sleep,
          logger,
        }),
        traffic: new TrafficSwitch({
          proxy: this.proxy,
          pointer: this.pointer,
          currentAlias: this.layout.currentAlias,
          staticSubdir: config.proxy.static_subdir,
          logger,
        }),
        diskGuard,
        sleep: options.sleep,
        now: clock ? () => clock().getTime() : undefined,
      }
    );

    instrumentOrchestrator(this.orchestrator);
  }

  /**
   * Stage an artifact and promote it through the blue-green protocol.
   */
  deploy(artifactPath: string, options: DeployOptions = {}): Promise<DeploymentReport> {
    return this.orchestrator.deploy({ kind: 'artifact', path: artifactPath }, options);
  }

  /**
   * Promote an already staged release (manual rollback to a kept release).
   */
  redeploy(releaseId: string, options: DeployOptions = {}): Promise<DeploymentReport> {
    return this.orchestrator.deploy({ kind: 'release', id: releaseId }, options);
  }

  async status(): Promise<DeployerStatus> {
    const pointer = await this.pointer.read();
    const slots: SlotStatus[] = [];

    for (const id of SLOT_IDS) {
      const slot = this.layout.slots[id];
      const running = await resultify(this.supervisor.isRunning(slot));
      slots.push({
        id,
        label: slot.label,
        port: slot.port,
        live: pointer?.slot === id,
        releaseId: await this.store.boundReleaseId(slot),
        running: running.ok ? running.val : null,
      });
    }

    return {
      pointer,
      proxyPort: await this.proxy.currentPort(),
      slots,
      releases: await this.store.list(),
    };
  }

  /**
   * Apply retention outside a deployment. Slot-bound releases are kept.
   */
  async prune(): Promise<PruneResult> {
    const protectedIds = new Set<string>();
    for (const id of SLOT_IDS) {
      const bound = await this.store.boundReleaseId(this.layout.slots[id]);
      if (bound !== null) {
        protectedIds.add(bound);
      }
    }
    return this.store.prune(this.config.release.keep_releases, protectedIds);
  }

  /**
   * Stop one slot's process.
   *
   * @throws {SupervisorError} when the slot is live and `allowLive` is not set
   */
  async stop(slotId: SlotId, options: StopSlotOptions = {}): Promise<SlotBinding> {
    const slot = this.layout.slots[slotId];
    const pointer = await this.pointer.read();
    if (pointer?.slot === slotId && !options.allowLive) {
      throw new SupervisorError(
        processName(this.config.app.name, slot),
        `Slot ${slotId} (${slot.label}) is live; refusing to stop it`,
        { slot: slotId }
      );
    }

    await this.supervisor.stop(slot, { force: options.force });
    this.logger?.info({ slot: slot.label }, 'Slot stopped');
    return slot;
  }

  private createProxy(runner: CommandRunner | undefined): ReverseProxy {
    const { proxy } = this.config;
    if (proxy.driver === 'none') {
      return new NoopProxy();
    }
    return new NginxProxy({
      appName: this.config.app.name,
      upstreamHost: proxy.upstream_host,
      listenPort: proxy.listen_port,
      serverNames: proxy.server_names,
      keepalive: proxy.keepalive,
      staticUrlPrefix: proxy.static_url_prefix,
      cacheMaxAge: proxy.cache_max_age,
      configPath: proxy.config_path,
      testCommand: proxy.test_command,
      reloadCommand: proxy.reload_command,
      runner,
      logger: this.logger,
    });
  }
}
