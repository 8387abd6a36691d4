/**
 * On-disk layout derived from configuration.
 *
 *   <base_dir>/releases/<id>     staged releases
 *   <base_dir>/<label>           slot working-directory aliases
 *   <base_dir>/current           alias to the live slot
 *   <base_dir>/live.json         LivePointer record
 *   <base_dir>/logs              supervisor log files
 */

import { isAbsolute, join } from 'node:path';
import type { DeployConfig } from '../types/schemas/config.js';
import type { SlotTable } from '../types/slot.js';

export interface DeployLayout {
  baseDir: string;
  releasesDir: string;
  currentAlias: string;
  livePointerFile: string;
  logDir: string;
  sharedEnvFile: string | null;
  slots: SlotTable;
}

function underBase(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : join(baseDir, path);
}

export function resolveLayout(config: DeployConfig): DeployLayout {
  const baseDir = config.app.base_dir;

  return {
    baseDir,
    releasesDir: underBase(baseDir, config.release.dir),
    currentAlias: join(baseDir, 'current'),
    livePointerFile: join(baseDir, 'live.json'),
    logDir: underBase(baseDir, config.supervisor.log_dir),
    sharedEnvFile:
      config.app.shared_env_file === null ? null : underBase(baseDir, config.app.shared_env_file),
    slots: {
      A: {
        id: 'A',
        label: config.slots.a.label,
        port: config.slots.a.port,
        dir: join(baseDir, config.slots.a.label),
      },
      B: {
        id: 'B',
        label: config.slots.b.label,
        port: config.slots.b.port,
        dir: join(baseDir, config.slots.b.label),
      },
    },
  };
}
