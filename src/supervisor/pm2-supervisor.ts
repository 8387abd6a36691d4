/**
 * pm2 driver
 *
 * One ecosystem file per slot (`ecosystem-<label>.config.cjs` under the app
 * base dir), started with `pm2 start` and removed with `pm2 delete`. Process
 * state is read from `pm2 jlist`.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { BuildMode, Release } from '../types/release.js';
import type { SlotBinding } from '../types/slot.js';
import type { EntrypointConfig } from '../types/schemas/config.js';
import { parseKeyValueLines } from '../types/schemas/metadata.js';
import { SupervisorError } from '../api/errors.js';
import { execaRunner, summarizeOutput, type CommandResult, type CommandRunner } from '../utils/command-runner.js';
import { isErrnoCode } from '../utils/fs-helpers.js';
import {
  buildProcessDescriptor,
  processName,
  type ProcessDescriptor,
  type ProcessHandle,
  type ProcessSupervisor,
  type StopOptions,
} from './process-supervisor.js';

const Pm2ProcessListSchema = z.array(
  z.object({
    name: z.string(),
    pm2_env: z.object({ status: z.string() }).passthrough().optional(),
  }).passthrough()
);

const ALIVE_STATUSES = new Set(['online', 'launching']);
const NOT_FOUND_PATTERN = /not found/i;

export interface Pm2SupervisorOptions {
  appName: string;
  pm2Bin: string;
  /** Directory holding the per-slot ecosystem files */
  ecosystemDir: string;
  logDir: string;
  maxMemoryRestart: string;
  entrypoints: Readonly<Record<BuildMode, EntrypointConfig>>;
  runner?: CommandRunner;
  now?: () => Date;
  logger?: Logger;
}

export function ecosystemFileName(slot: SlotBinding): string {
  return `ecosystem-${slot.label}.config.cjs`;
}

/**
 * Render a pm2 ecosystem module for one slot process.
 */
export function renderEcosystem(
  descriptor: ProcessDescriptor,
  options: { logDir: string; label: string; maxMemoryRestart: string }
): string {
  const app = {
    name: descriptor.name,
    script: descriptor.entrypoint,
    args: descriptor.args,
    cwd: descriptor.workingDir,
    instances: 1,
    exec_mode: 'cluster',
    env: descriptor.env,
    env_file: descriptor.envFilePath,
    max_memory_restart: options.maxMemoryRestart,
    error_file: join(options.logDir, `${options.label}-error.log`),
    out_file: join(options.logDir, `${options.label}-out.log`),
    merge_logs: true,
    time: true,
  };
  return `module.exports = ${JSON.stringify({ apps: [app] }, null, 2)};\n`;
}

export class Pm2Supervisor implements ProcessSupervisor {
  private readonly options: Pm2SupervisorOptions;
  private readonly runner: CommandRunner;
  private readonly logger?: Logger;

  constructor(options: Pm2SupervisorOptions) {
    this.options = options;
    this.runner = options.runner ?? execaRunner;
    this.logger = options.logger?.child({ component: 'Pm2Supervisor' });
  }

  async start(slot: SlotBinding, release: Release): Promise<ProcessHandle> {
    const descriptor = buildProcessDescriptor(this.options.appName, slot, release, this.options.entrypoints);
    descriptor.env = { ...(await this.readEnvFile(descriptor.name, descriptor.envFilePath)), ...descriptor.env };

    // A process left behind by an interrupted run would hold the port.
    await this.stop(slot, { force: true });

    const ecosystemPath = join(this.options.ecosystemDir, ecosystemFileName(slot));
    try {
      await mkdir(this.options.logDir, { recursive: true });
      await mkdir(this.options.ecosystemDir, { recursive: true });
      await writeFile(
        ecosystemPath,
        renderEcosystem(descriptor, {
          logDir: this.options.logDir,
          label: slot.label,
          maxMemoryRestart: this.options.maxMemoryRestart,
        }),
        'utf8'
      );
    } catch (error) {
      throw new SupervisorError(descriptor.name, `Cannot write ${ecosystemPath}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const result = await this.pm2(['start', ecosystemPath]);
    if (result.exitCode !== 0) {
      throw new SupervisorError(descriptor.name, `pm2 start failed: ${summarizeOutput(result)}`, {
        exitCode: result.exitCode,
      });
    }

    this.logger?.info(
      { name: descriptor.name, port: descriptor.port, releaseId: release.id, script: descriptor.entrypoint },
      'Process started'
    );

    return {
      name: descriptor.name,
      slot: slot.id,
      port: descriptor.port,
      releaseId: release.id,
      startedAt: (this.options.now ?? (() => new Date()))().toISOString(),
    };
  }

  async stop(slot: SlotBinding, options: StopOptions = {}): Promise<void> {
    const name = processName(this.options.appName, slot);
    if (!(await this.exists(name))) {
      this.logger?.debug({ name }, 'No process to stop');
      return;
    }

    if (!options.force) {
      const stopped = await this.pm2(['stop', name]);
      this.ensureSucceeded(name, 'stop', stopped);
    }
    const deleted = await this.pm2(['delete', name]);
    this.ensureSucceeded(name, 'delete', deleted);

    this.logger?.info({ name, force: options.force ?? false }, 'Process stopped');
  }

  async isRunning(slot: SlotBinding): Promise<boolean> {
    const entry = (await this.list()).find((p) => p.name === processName(this.options.appName, slot));
    const status = entry?.pm2_env?.status;
    return status !== undefined && ALIVE_STATUSES.has(status);
  }

  async persist(): Promise<void> {
    const result = await this.pm2(['save']);
    if (result.exitCode !== 0) {
      throw new SupervisorError(this.options.appName, `pm2 save failed: ${summarizeOutput(result)}`, {
        exitCode: result.exitCode,
      });
    }
  }

  private async exists(name: string): Promise<boolean> {
    return (await this.list()).some((p) => p.name === name);
  }

  private async list(): Promise<z.infer<typeof Pm2ProcessListSchema>> {
    const result = await this.pm2(['jlist']);
    if (result.exitCode !== 0) {
      throw new SupervisorError(this.options.appName, `pm2 jlist failed: ${summarizeOutput(result)}`, {
        exitCode: result.exitCode,
      });
    }

    // Older pm2 releases print banner lines before the JSON array.
    const start = result.stdout.indexOf('[');
    let parsed: unknown;
    try {
      parsed = start === -1 ? [] : JSON.parse(result.stdout.slice(start));
    } catch {
      throw new SupervisorError(this.options.appName, 'pm2 jlist returned malformed JSON');
    }

    const list = Pm2ProcessListSchema.safeParse(parsed);
    if (!list.success) {
      throw new SupervisorError(this.options.appName, 'pm2 jlist returned an unexpected shape', {
        issues: list.error.issues.map((issue) => issue.message),
      });
    }
    return list.data;
  }

  private ensureSucceeded(name: string, action: string, result: CommandResult): void {
    // The process can vanish between jlist and the command.
    if (result.exitCode === 0 || NOT_FOUND_PATTERN.test(`${result.stdout}\n${result.stderr}`)) {
      return;
    }
    throw new SupervisorError(name, `pm2 ${action} failed: ${summarizeOutput(result)}`, {
      exitCode: result.exitCode,
    });
  }

  private async readEnvFile(name: string, path: string): Promise<Record<string, string>> {
    try {
      return parseKeyValueLines(await readFile(path, 'utf8'));
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return {};
      }
      throw new SupervisorError(name, `Cannot read ${path}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private pm2(args: readonly string[]): Promise<CommandResult> {
    return this.runner(this.options.pm2Bin, args);
  }
}
