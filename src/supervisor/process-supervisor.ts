/**
 * Process supervisor contract.
 *
 * A slot's process is always named `<app>-<label>`, runs from the slot's
 * working-directory alias and listens on the slot's fixed port.
 */

import { isAbsolute, join } from 'node:path';
import type { BuildMode, Release } from '../types/release.js';
import type { SlotBinding, SlotId } from '../types/slot.js';
import type { EntrypointConfig } from '../types/schemas/config.js';

export const PORT_PLACEHOLDER = '{port}';

export interface ProcessDescriptor {
  name: string;
  workingDir: string;
  /** Absolute script path */
  entrypoint: string;
  args: string[];
  port: number;
  envFilePath: string;
  env: Record<string, string>;
}

export interface ProcessHandle {
  name: string;
  slot: SlotId;
  port: number;
  releaseId: string;
  startedAt: string;
}

export interface StopOptions {
  /** Skip graceful shutdown */
  force?: boolean;
}

export interface ProcessSupervisor {
  /**
   * Start the slot's process for `release`, replacing any stale process
   * under the same name.
   *
   * @throws {SupervisorError}
   */
  start(slot: SlotBinding, release: Release): Promise<ProcessHandle>;

  /**
   * Stop and forget the slot's process. Succeeds when none exists.
   *
   * @throws {SupervisorError}
   */
  stop(slot: SlotBinding, options?: StopOptions): Promise<void>;

  isRunning(slot: SlotBinding): Promise<boolean>;

  /**
   * Save the process list so it survives a host reboot.
   */
  persist(): Promise<void>;
}

export function processName(appName: string, slot: SlotBinding): string {
  return `${appName}-${slot.label}`;
}

export function buildProcessDescriptor(
  appName: string,
  slot: SlotBinding,
  release: Release,
  entrypoints: Readonly<Record<BuildMode, EntrypointConfig>>
): ProcessDescriptor {
  const entry = entrypoints[release.buildMode];
  const port = String(slot.port);

  return {
    name: processName(appName, slot),
    workingDir: slot.dir,
    entrypoint: isAbsolute(entry.script) ? entry.script : join(slot.dir, entry.script),
    args: entry.args.map((arg) => arg.split(PORT_PLACEHOLDER).join(port)),
    port: slot.port,
    envFilePath: join(slot.dir, '.env'),
    env: { NODE_ENV: 'production', PORT: port },
  };
}
