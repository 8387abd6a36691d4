/**
 * nginx driver
 *
 * Renders the site file, validates it with the configured test command and
 * reloads. A rejected or failed reload puts the previous file back (or
 * removes the new one when there was none) before the error surfaces, so
 * nginx keeps serving the old backend.
 */

import { mkdir, readFile, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { ProxyBackend, ReverseProxy } from './reverse-proxy.js';
import { parseUpstreamPort, renderNginxSite, type NginxSiteOptions } from './nginx-config.js';
import { ProxyReloadError, errorMessage } from '../api/errors.js';
import { execaRunner, summarizeOutput, type CommandRunner } from '../utils/command-runner.js';
import { isErrnoCode, writeFileAtomic } from '../utils/fs-helpers.js';

export interface NginxProxyOptions extends NginxSiteOptions {
  configPath: string;
  testCommand: readonly string[];
  reloadCommand: readonly string[];
  runner?: CommandRunner;
  logger?: Logger;
}

export class NginxProxy implements ReverseProxy {
  readonly driver = 'nginx';
  private readonly options: NginxProxyOptions;
  private readonly runner: CommandRunner;
  private readonly logger?: Logger;

  constructor(options: NginxProxyOptions) {
    this.options = options;
    this.runner = options.runner ?? execaRunner;
    this.logger = options.logger?.child({ component: 'NginxProxy' });
  }

  async apply(backend: ProxyBackend): Promise<void> {
    const { configPath } = this.options;
    const previous = await this.readConfig();
    const next = renderNginxSite(this.options, backend);

    try {
      await mkdir(dirname(configPath), { recursive: true });
      await writeFileAtomic(configPath, next);
    } catch (error) {
      throw new ProxyReloadError(`Cannot write ${configPath}: ${errorMessage(error)}`, { configPath });
    }

    const failure =
      (await this.runStep('test', this.options.testCommand)) ??
      (await this.runStep('reload', this.options.reloadCommand));

    if (failure) {
      await this.restore(previous);
      throw failure;
    }

    this.logger?.info({ port: backend.port, configPath }, 'Proxy now forwards to new backend');
  }

  async currentPort(): Promise<number | null> {
    const content = await this.readConfig();
    return content === null ? null : parseUpstreamPort(content);
  }

  private async runStep(step: 'test' | 'reload', command: readonly string[]): Promise<ProxyReloadError | null> {
    const [file, ...args] = command;
    if (file === undefined) {
      return null;
    }

    const result = await this.runner(file, args);
    if (result.exitCode === 0) {
      return null;
    }

    this.logger?.error({ step, command: result.command, exitCode: result.exitCode }, 'Proxy command failed');
    return new ProxyReloadError(`nginx ${step} failed: ${summarizeOutput(result)}`, {
      step,
      command: result.command,
      exitCode: result.exitCode,
    });
  }

  private async restore(previous: string | null): Promise<void> {
    const { configPath } = this.options;
    if (previous === null) {
      await rm(configPath, { force: true });
    } else {
      await writeFileAtomic(configPath, previous);
    }
    this.logger?.warn({ configPath }, 'Previous proxy configuration restored');
  }

  private async readConfig(): Promise<string | null> {
    try {
      return await readFile(this.options.configPath, 'utf8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return null;
      }
      throw new ProxyReloadError(`Cannot read ${this.options.configPath}: ${errorMessage(error)}`, {
        configPath: this.options.configPath,
      });
    }
  }
}
