/**
 * Disk Guard
 *
 * Free-space check run before staging. When the volume holding the app base
 * dir is below the configured minimum, retention and the configured cleanup
 * commands run first (each best-effort); if space is still short, staging is
 * refused.
 */

import { statfs as fsStatfs } from 'node:fs/promises';
import type { StatsFs } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { DeployWarning } from '../types/release.js';
import { StagingError } from '../api/errors.js';
import { execaRunner, summarizeOutput, type CommandRunner } from '../utils/command-runner.js';
import { isErrnoCode } from '../utils/fs-helpers.js';
import { Err, Ok, resultify, settleBestEffort } from '../utils/result-helpers.js';

const BYTES_PER_GB = 1024 ** 3;

export type StatFs = (path: string) => Promise<Pick<StatsFs, 'bavail' | 'bsize'>>;

export interface DiskGuardOptions {
  /** Any path on the volume to check; missing trailing components are skipped */
  path: string;
  minFreeGb: number;
  cleanupCommands: ReadonlyArray<readonly string[]>;
  /** Retention pass run before the cleanup commands */
  prune: () => Promise<unknown>;
  runner?: CommandRunner;
  statfs?: StatFs;
  logger?: Logger;
}

export interface DiskCheck {
  freeGb: number;
  cleaned: boolean;
}

function roundGb(bytes: number): number {
  return Math.round((bytes / BYTES_PER_GB) * 100) / 100;
}

export class DiskGuard {
  private readonly options: DiskGuardOptions;
  private readonly runner: CommandRunner;
  private readonly statfs: StatFs;
  private readonly logger?: Logger;

  constructor(options: DiskGuardOptions) {
    this.options = options;
    this.runner = options.runner ?? execaRunner;
    this.statfs = options.statfs ?? fsStatfs;
    this.logger = options.logger?.child({ component: 'DiskGuard' });
  }

  async freeGb(): Promise<number> {
    let path = this.options.path;
    for (;;) {
      try {
        const stats = await this.statfs(path);
        return roundGb(stats.bavail * stats.bsize);
      } catch (error) {
        const parent = dirname(path);
        if (!isErrnoCode(error, 'ENOENT') || parent === path) {
          throw error;
        }
        path = parent;
      }
    }
  }

  /**
   * @throws {StagingError} reason `insufficient-space` when cleanup did not free enough
   */
  async ensureSpace(warnings: DeployWarning[]): Promise<DiskCheck> {
    const { minFreeGb } = this.options;
    const before = await this.freeGb();
    if (before >= minFreeGb) {
      return { freeGb: before, cleaned: false };
    }

    this.logger?.warn({ freeGb: before, minFreeGb }, 'Low disk space; running cleanup');

    settleBestEffort(await resultify(this.options.prune()), {
      step: 'maintenance',
      logger: this.logger,
      warnings,
      label: 'retention',
    });

    for (const command of this.options.cleanupCommands) {
      const [file, ...args] = command;
      if (file === undefined) {
        continue;
      }
      const result = await this.runner(file, args);
      settleBestEffort(
        result.exitCode === 0 ? Ok(result) : Err(new Error(summarizeOutput(result))),
        { step: 'maintenance', logger: this.logger, warnings, label: result.command }
      );
    }

    const after = await this.freeGb();
    this.logger?.info({ before, after }, 'Disk cleanup finished');
    if (after < minFreeGb) {
      throw new StagingError(
        'insufficient-space',
        `Only ${after} GB free after cleanup; ${minFreeGb} GB required`,
        { freeGb: after, minFreeGb }
      );
    }
    return { freeGb: after, cleaned: true };
  }
}
