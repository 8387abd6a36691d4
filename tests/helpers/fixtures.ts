/**
 * Filesystem fixtures: temp app roots and artifact directories.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino, type Logger } from 'pino';
import type { BuildMode } from '../../src/types/release.js';
import type { SlotTable } from '../../src/types/slot.js';

export const silentLogger: Logger = pino({ level: 'silent' });

export async function makeTempDir(prefix = 'slotswap-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export function slotTable(baseDir: string): SlotTable {
  return {
    A: { id: 'A', label: 'blue', port: 3000, dir: join(baseDir, 'blue') },
    B: { id: 'B', label: 'green', port: 3001, dir: join(baseDir, 'green') },
  };
}

export interface ArtifactOptions {
  buildMode?: BuildMode;
  timestamp?: string;
  meta?: string | null;
  files?: Record<string, string>;
}

/**
 * Create an unpacked artifact directory with a DEPLOY_META record.
 */
export async function makeArtifact(root: string, name: string, options: ArtifactOptions = {}): Promise<string> {
  const dir = join(root, name);
  await mkdir(dir, { recursive: true });

  const meta =
    options.meta === undefined
      ? [
          `TIMESTAMP=${options.timestamp ?? '20250101120000'}`,
          `BUILD_MODE=${options.buildMode ?? 'standalone'}`,
          'NODE_VERSION=20.11.0',
          'PACKAGE_MANAGER=npm',
          'GIT_COMMIT=abc1234',
          '',
        ].join('\n')
      : options.meta;
  if (meta !== null) {
    await writeFile(join(dir, 'DEPLOY_META'), meta, 'utf8');
  }

  for (const [file, content] of Object.entries(options.files ?? { 'server.js': 'console.log("ok");\n' })) {
    await mkdir(join(dir, file, '..'), { recursive: true });
    await writeFile(join(dir, file), content, 'utf8');
  }
  return dir;
}

/**
 * Clock that advances one second per call, starting at `start`.
 */
export function steppingClock(start = '2025-01-01T12:00:00.000Z'): () => Date {
  let current = new Date(start).getTime();
  return () => {
    const value = new Date(current);
    current += 1000;
    return value;
  };
}
