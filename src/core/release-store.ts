/**
 * Release Store
 *
 * Catalog of timestamped release directories under `<base>/releases`.
 * Releases are immutable once staged and are removed only by retention,
 * which never touches a release bound to a slot alias.
 */

import { cp, mkdir, readdir, readFile, readlink, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import type { Logger } from 'pino';
import type { Release, PruneResult } from '../types/release.js';
import type { SlotBinding } from '../types/slot.js';
import { DeployMetaSchema, parseKeyValueLines, toReleaseMetadata } from '../types/schemas/metadata.js';
import { PruneError, StagingError, errorMessage } from '../api/errors.js';
import { execaRunner, summarizeOutput, type CommandRunner } from '../utils/command-runner.js';
import { isErrnoCode, pathExists, swapSymlink } from '../utils/fs-helpers.js';

export const DEPLOY_META_FILE = 'DEPLOY_META';
const RELEASE_ID_PATTERN = /^\d{14}$/;
const TARBALL_PATTERN = /\.(tar\.gz|tgz)$/i;

export interface ReleaseStoreOptions {
  releasesDir: string;
  /** Copied into every release as `.env`; null skips the copy */
  sharedEnvFile: string | null;
  /** Production dependency install for `regular` builds; null skips it */
  installCommand: readonly string[] | null;
  installTimeoutMs: number;
  runner?: CommandRunner;
  now?: () => Date;
  logger?: Logger;
}

/**
 * `YYYYMMDDHHmmss` in UTC.
 */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.TZ]/g, '').slice(0, 14);
}

function releaseIdToIso(id: string): string {
  return `${id.slice(0, 4)}-${id.slice(4, 6)}-${id.slice(6, 8)}T${id.slice(8, 10)}:${id.slice(10, 12)}:${id.slice(12, 14)}.000Z`;
}

/**
 * Ensure `NODE_ENV=production` is present in an env file body.
 */
export function withProductionEnv(content: string): string {
  if (/^NODE_ENV=/m.test(content)) {
    return content;
  }
  const prefix = content.length === 0 || content.endsWith('\n') ? content : `${content}\n`;
  return `${prefix}NODE_ENV=production\n`;
}

export class ReleaseStore {
  private readonly options: ReleaseStoreOptions;
  private readonly runner: CommandRunner;
  private readonly logger?: Logger;

  constructor(options: ReleaseStoreOptions) {
    this.options = options;
    this.runner = options.runner ?? execaRunner;
    this.logger = options.logger?.child({ component: 'ReleaseStore' });
  }

  get releasesDir(): string {
    return this.options.releasesDir;
  }

  /**
   * Extract an artifact into a fresh release directory.
   *
   * @throws {StagingError} on collision, extraction, metadata or install failure
   */
  async stage(artifactPath: string): Promise<Release> {
    if (!(await pathExists(artifactPath))) {
      throw new StagingError('not-found', `Artifact not found: ${artifactPath}`, { artifactPath });
    }

    const id = await this.allocateId();
    const dir = join(this.options.releasesDir, id);

    try {
      await mkdir(dir);
    } catch (error) {
      if (isErrnoCode(error, 'EEXIST')) {
        throw new StagingError('collision', `Release ${id} already exists`, { releaseId: id });
      }
      throw new StagingError('extraction', `Cannot create release directory: ${errorMessage(error)}`, {
        releaseId: id,
      });
    }

    this.logger?.info({ releaseId: id, artifactPath }, 'Staging release');

    try {
      await this.extract(artifactPath, dir);
      const release = await this.readRelease(id);
      await this.installEnvFile(dir);
      if (release.buildMode === 'regular') {
        await this.installDependencies(dir);
      }
      this.logger?.info({ releaseId: id, buildMode: release.buildMode }, 'Release staged');
      return release;
    } catch (error) {
      await rm(dir, { recursive: true, force: true });
      if (error instanceof StagingError) {
        throw error;
      }
      throw new StagingError('extraction', `Staging failed: ${errorMessage(error)}`, { releaseId: id });
    }
  }

  /**
   * Load an already staged release.
   *
   * @throws {StagingError} when the release is missing or its metadata is unreadable
   */
  async get(id: string): Promise<Release> {
    if (!RELEASE_ID_PATTERN.test(id) || !(await pathExists(join(this.options.releasesDir, id)))) {
      throw new StagingError('not-found', `Release ${id} not found`, { releaseId: id });
    }
    return this.readRelease(id);
  }

  /**
   * Release ids, newest first.
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.options.releasesDir);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    const ids: string[] = [];
    for (const entry of entries) {
      if (!RELEASE_ID_PATTERN.test(entry)) {
        continue;
      }
      const info = await stat(join(this.options.releasesDir, entry));
      if (info.isDirectory()) {
        ids.push(entry);
      }
    }

    return ids.sort().reverse();
  }

  /**
   * Point a slot's working-directory alias at a release.
   */
  async bindSlot(slot: SlotBinding, release: Release): Promise<void> {
    await mkdir(dirname(slot.dir), { recursive: true });
    await swapSymlink(release.dir, slot.dir);
    this.logger?.info({ slot: slot.label, releaseId: release.id }, 'Slot bound to release');
  }

  /**
   * Release id a slot alias currently backs, or null.
   */
  async boundReleaseId(slot: SlotBinding): Promise<string | null> {
    let target: string;
    try {
      target = await readlink(slot.dir);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'EINVAL')) {
        return null;
      }
      throw error;
    }

    const resolved = resolve(dirname(slot.dir), target);
    if (dirname(resolved) !== resolve(this.options.releasesDir)) {
      return null;
    }
    const id = basename(resolved);
    return RELEASE_ID_PATTERN.test(id) ? id : null;
  }

  /**
   * Delete releases beyond the `keep` most recent, skipping protected ids.
   *
   * @throws {PruneError} after the pass if any removal failed
   */
  async prune(keep: number, protectedIds: ReadonlySet<string>): Promise<PruneResult> {
    const ids = await this.list();
    const removed: string[] = [];
    const failures: Array<{ releaseId: string; error: string }> = [];

    for (const id of ids.slice(keep)) {
      if (protectedIds.has(id)) {
        continue;
      }
      try {
        await rm(join(this.options.releasesDir, id), { recursive: true, force: true });
        removed.push(id);
      } catch (error) {
        failures.push({ releaseId: id, error: errorMessage(error) });
      }
    }

    if (removed.length > 0) {
      this.logger?.info({ removed, keep }, 'Pruned old releases');
    }
    if (failures.length > 0) {
      throw new PruneError(failures);
    }

    return {
      removed,
      kept: ids.filter((id) => !removed.includes(id)),
      protected: ids.filter((id) => protectedIds.has(id)),
    };
  }

  /**
   * Next id from the clock. An id not strictly newer than every existing
   * release is a collision (same second, or the clock went backwards).
   */
  private async allocateId(): Promise<string> {
    const id = compactTimestamp((this.options.now ?? (() => new Date()))());
    await mkdir(this.options.releasesDir, { recursive: true });
    const [latest] = await this.list();
    if (latest !== undefined && latest >= id) {
      throw new StagingError('collision', `Release id ${id} is not newer than ${latest}`, {
        releaseId: id,
        latest,
      });
    }
    return id;
  }

  private async extract(artifactPath: string, dir: string): Promise<void> {
    const info = await stat(artifactPath);
    if (info.isDirectory()) {
      await cp(artifactPath, dir, { recursive: true });
      return;
    }

    if (!TARBALL_PATTERN.test(artifactPath)) {
      throw new StagingError('malformed', `Unsupported artifact format: ${basename(artifactPath)}`, {
        artifactPath,
      });
    }

    const result = await this.runner('tar', ['-xzf', artifactPath, '-C', dir]);
    if (result.exitCode !== 0) {
      throw new StagingError('extraction', `Extraction failed: ${summarizeOutput(result)}`, {
        artifactPath,
        exitCode: result.exitCode,
      });
    }
  }

  private async readRelease(id: string): Promise<Release> {
    const dir = join(this.options.releasesDir, id);
    let content: string;
    try {
      content = await readFile(join(dir, DEPLOY_META_FILE), 'utf8');
    } catch {
      throw new StagingError('malformed', `Release ${id} has no ${DEPLOY_META_FILE} record`, { releaseId: id });
    }

    const parsed = DeployMetaSchema.safeParse(parseKeyValueLines(content));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
      throw new StagingError('malformed', `Release ${id} has an invalid ${DEPLOY_META_FILE}: ${issues.join('; ')}`, {
        releaseId: id,
        issues,
      });
    }

    const metadata = toReleaseMetadata(parsed.data);
    return {
      id,
      dir,
      buildMode: metadata.buildMode,
      createdAt: releaseIdToIso(id),
      metadata,
    };
  }

  private async installEnvFile(dir: string): Promise<void> {
    const { sharedEnvFile } = this.options;
    if (sharedEnvFile === null) {
      return;
    }

    let content = '';
    try {
      content = await readFile(sharedEnvFile, 'utf8');
    } catch (error) {
      if (!isErrnoCode(error, 'ENOENT')) {
        throw error;
      }
      this.logger?.warn({ sharedEnvFile }, 'Shared env file missing; release gets NODE_ENV only');
    }

    await writeFile(join(dir, '.env'), withProductionEnv(content), 'utf8');
  }

  private async installDependencies(dir: string): Promise<void> {
    const command = this.options.installCommand;
    if (command === null) {
      return;
    }
    const [file, ...args] = command;
    if (file === undefined) {
      return;
    }

    this.logger?.info({ command: command.join(' ') }, 'Installing production dependencies');
    const result = await this.runner(file, args, { cwd: dir, timeoutMs: this.options.installTimeoutMs });
    if (result.exitCode !== 0) {
      throw new StagingError('install', `Dependency install failed: ${summarizeOutput(result)}`, {
        command: result.command,
        exitCode: result.exitCode,
      });
    }
  }
}
