import { describe, it, expect } from 'vitest';
import { DiskGuard, type StatFs } from '../../../src/services/disk-guard.js';
import { StagingError } from '../../../src/api/errors.js';
import type { DeployWarning } from '../../../src/types/release.js';
import { FakeCommandRunner } from '../../helpers/command-runner.js';
import { silentLogger } from '../../helpers/fixtures.js';

const BLOCK_SIZE = 4096;
const BLOCKS_PER_GB = (1024 ** 3) / BLOCK_SIZE;

/** Reports each value in turn (GB free), repeating the last one */
function scriptedStatfs(freeGb: number[], paths: string[] = []): StatFs {
  const queue = [...freeGb];
  return async (path) => {
    paths.push(path);
    const next = queue.length > 1 ? queue.shift() : queue[0];
    return { bavail: Math.round((next ?? 0) * BLOCKS_PER_GB), bsize: BLOCK_SIZE };
  };
}

function createGuard(freeGb: number[], runner = new FakeCommandRunner(), prune: () => Promise<unknown> = async () => []) {
  return new DiskGuard({
    path: '/srv/shop',
    minFreeGb: 2,
    cleanupCommands: [['npm', 'cache', 'clean', '--force'], ['docker', 'image', 'prune', '-f']],
    prune,
    runner: runner.run,
    statfs: scriptedStatfs(freeGb),
    logger: silentLogger,
  });
}

describe('DiskGuard', () => {
  it('passes without cleanup when enough space is free', async () => {
    const runner = new FakeCommandRunner();
    let pruned = 0;
    const guard = createGuard([5.5], runner, async () => pruned++);
    const warnings: DeployWarning[] = [];

    expect(await guard.ensureSpace(warnings)).toEqual({ freeGb: 5.5, cleaned: false });
    expect(pruned).toBe(0);
    expect(runner.calls).toEqual([]);
    expect(warnings).toEqual([]);
  });

  it('runs retention and cleanup commands when space is short', async () => {
    const runner = new FakeCommandRunner();
    let pruned = 0;
    const guard = createGuard([1.25, 3], runner, async () => pruned++);

    expect(await guard.ensureSpace([])).toEqual({ freeGb: 3, cleaned: true });
    expect(pruned).toBe(1);
    expect(runner.lines()).toEqual(['npm cache clean --force', 'docker image prune -f']);
  });

  it('records failing cleanup steps as maintenance warnings', async () => {
    const runner = new FakeCommandRunner().on('docker', { exitCode: 127, stderr: 'docker: command not found' });
    const guard = createGuard([1, 2], runner, async () => {
      throw new Error('release 20250101120000 is busy');
    });
    const warnings: DeployWarning[] = [];

    await guard.ensureSpace(warnings);

    expect(warnings).toEqual([
      { step: 'maintenance', message: 'retention: release 20250101120000 is busy' },
      { step: 'maintenance', message: 'docker image prune -f: docker: command not found' },
    ]);
  });

  it('refuses staging when cleanup does not free enough', async () => {
    const guard = createGuard([0.5, 1.5]);

    const error = await guard.ensureSpace([]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StagingError);
    expect(error).toMatchObject({
      reason: 'insufficient-space',
      message: 'Only 1.5 GB free after cleanup; 2 GB required',
      details: { freeGb: 1.5, minFreeGb: 2 },
    });
  });

  it('measures the nearest existing parent of a missing path', async () => {
    const paths: string[] = [];
    const base = scriptedStatfs([4], paths);
    const guard = new DiskGuard({
      path: '/srv/shop/app',
      minFreeGb: 1,
      cleanupCommands: [],
      prune: async () => [],
      statfs: async (path) => {
        if (path !== '/srv') {
          paths.push(path);
          throw Object.assign(new Error(`ENOENT: no such file or directory, statfs '${path}'`), { code: 'ENOENT' });
        }
        return base(path);
      },
    });

    expect(await guard.freeGb()).toBe(4);
    expect(paths).toEqual(['/srv/shop/app', '/srv/shop', '/srv']);
  });
});
