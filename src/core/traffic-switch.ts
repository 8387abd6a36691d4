/**
 * Traffic Switch
 *
 * Cutover is two steps in a fixed order: the proxy is reloaded against the
 * target port and verified, then the LivePointer is written. A proxy failure
 * leaves the pointer untouched. A pointer failure after a good reload puts the
 * proxy back on the previous port so proxy and pointer keep agreeing. When
 * that revert is impossible the error carries `proxyOnTarget`, since the
 * target is then serving traffic.
 */

import { join } from 'node:path';
import type { Logger } from 'pino';
import type { SlotBinding, LivePointerRecord } from '../types/slot.js';
import type { Release } from '../types/release.js';
import type { ReverseProxy } from '../proxy/reverse-proxy.js';
import type { LivePointer } from './live-pointer.js';
import { DeployError, LivePointerError, errorMessage } from '../api/errors.js';

export interface TrafficSwitchOptions {
  proxy: ReverseProxy;
  pointer: Pick<LivePointer, 'write'>;
  /** The live alias (`<base>/current`) static assets are served through */
  currentAlias: string;
  staticSubdir: string;
  logger?: Logger;
}

export class TrafficSwitch {
  private readonly options: TrafficSwitchOptions;
  private readonly logger?: Logger;

  constructor(options: TrafficSwitchOptions) {
    this.options = options;
    this.logger = options.logger?.child({ component: 'TrafficSwitch' });
  }

  /**
   * Route production traffic to `target`.
   *
   * @param previous - Slot to fall back to if the pointer write fails
   * @throws {ProxyReloadError} when the proxy rejects the new backend
   * @throws {LivePointerError} when the pointer cannot be written
   */
  async cutover(target: SlotBinding, release: Release | null, previous?: SlotBinding): Promise<LivePointerRecord> {
    const { proxy, pointer } = this.options;
    const staticRoot = join(this.options.currentAlias, this.options.staticSubdir);

    this.logger?.info({ slot: target.label, port: target.port }, 'Switching traffic');
    await proxy.apply({ port: target.port, staticRoot });

    try {
      return await pointer.write(target, release?.id ?? null);
    } catch (error) {
      if (previous && (await this.revert(previous, staticRoot, error))) {
        throw error;
      }
      throw new LivePointerError(errorMessage(error), {
        ...(error instanceof DeployError ? error.details : {}),
        proxyOnTarget: true,
        port: target.port,
      });
    }
  }

  private async revert(previous: SlotBinding, staticRoot: string, cause: unknown): Promise<boolean> {
    this.logger?.error(
      { err: cause, previousPort: previous.port },
      'Live pointer write failed; pointing proxy back at previous slot'
    );
    try {
      await this.options.proxy.apply({ port: previous.port, staticRoot });
      return true;
    } catch (revertError) {
      this.logger?.error(
        { revertError: errorMessage(revertError), previousPort: previous.port },
        'Proxy revert failed; proxy and live pointer disagree'
      );
      return false;
    }
  }
}
