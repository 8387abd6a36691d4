/**
 * End-to-end deployment flow through the Deployer with the real pm2 and
 * nginx drivers. Host commands go to a scripted runner that keeps a pm2
 * process table; health probes are answered from that table.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readlink, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { Deployer } from '../../src/api/deployer.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { validateConfig } from '../../src/config/loader.js';
import type { DeployConfig } from '../../src/types/schemas/config.js';
import { FakeCommandRunner } from '../helpers/command-runner.js';
import { makeArtifact, makeTempDir, removeDir, silentLogger, steppingClock } from '../helpers/fixtures.js';

const PORTS: Record<string, number> = { blue: 3000, green: 3001 };

class ScriptedHost {
  readonly runner = new FakeCommandRunner();
  /** pm2 process name -> status */
  readonly processes = new Map<string, string>();
  /** Ports whose app answers 503 */
  readonly failingPorts = new Set<number>();

  constructor() {
    this.runner
      .on('pm2 jlist', () => ({
        stdout: JSON.stringify([...this.processes].map(([name, status]) => ({ name, pm2_env: { status } }))),
      }))
      .on('pm2 start', (call) => {
        const label = /^ecosystem-(.+)\.config\.cjs$/.exec(basename(call.args[1] ?? ''))?.[1];
        this.processes.set(`shop-${label}`, 'online');
        return {};
      })
      .on('pm2 stop', (call) => {
        this.processes.set(call.args[1] ?? '', 'stopped');
        return {};
      })
      .on('pm2 delete', (call) => {
        this.processes.delete(call.args[1] ?? '');
        return {};
      });
  }

  readonly fetch: typeof fetch = async (input) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const port = Number(url.port);
    const label = Object.keys(PORTS).find((key) => PORTS[key] === port);
    if (label === undefined || this.processes.get(`shop-${label}`) !== 'online') {
      throw new TypeError('fetch failed');
    }
    return new Response('ok', { status: this.failingPorts.has(port) ? 503 : 200 });
  };
}

describe('Deploy flow', () => {
  let root: string;
  let baseDir: string;
  let nginxConf: string;
  let host: ScriptedHost;
  let deployer: Deployer;

  function createDeployer(overrides: Partial<DeployConfig> = {}): Deployer {
    const config = validateConfig({
      ...DEFAULT_CONFIG,
      app: { name: 'shop', base_dir: baseDir, shared_env_file: 'shared/.env' },
      health: { ...DEFAULT_CONFIG.health, timeout_seconds: 3 },
      settle: { grace_delay_ms: 0 },
      proxy: { ...DEFAULT_CONFIG.proxy, config_path: nginxConf },
      maintenance: { min_free_space_gb: 0, cleanup_commands: [] },
      ...overrides,
    });
    return new Deployer({
      config,
      logger: silentLogger,
      runner: host.runner.run,
      fetch: host.fetch,
      sleep: async () => true,
      clock: steppingClock(),
    });
  }

  async function readPointerFile(): Promise<unknown> {
    return JSON.parse(await readFile(join(baseDir, 'live.json'), 'utf8'));
  }

  beforeEach(async () => {
    root = await makeTempDir();
    baseDir = join(root, 'app');
    nginxConf = join(root, 'nginx', 'shop.conf');
    host = new ScriptedHost();
    await mkdir(join(baseDir, 'shared'), { recursive: true });
    await writeFile(join(baseDir, 'shared', '.env'), 'API_KEY=test-secret\n', 'utf8');
    deployer = createDeployer();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('alternates slots and keeps proxy, pointer and processes in agreement', async () => {
    const artifact = await makeArtifact(root, 'artifact');
    const expected = [
      { target: 'B', label: 'green', port: 3001, idle: 'shop-blue' },
      { target: 'A', label: 'blue', port: 3000, idle: 'shop-green' },
      { target: 'B', label: 'green', port: 3001, idle: 'shop-blue' },
    ];

    for (const [index, step] of expected.entries()) {
      const report = await deployer.deploy(artifact);

      expect(report.exitCode).toBe(0);
      expect(report.attempt.target.id).toBe(step.target);
      expect(await readPointerFile()).toMatchObject({ version: index + 1, slot: step.target, port: step.port });
      expect(await deployer.proxy.currentPort()).toBe(step.port);
      expect(await readlink(join(baseDir, 'current'))).toBe(join(baseDir, step.label));
      expect([...host.processes]).toEqual([[`shop-${step.label}`, 'online']]);
      expect(host.processes.has(step.idle)).toBe(false);
    }

    expect(host.runner.lines().filter((line) => line.startsWith('nginx') || line.startsWith('systemctl'))).toEqual([
      'nginx -t',
      'systemctl reload nginx',
      'nginx -t',
      'systemctl reload nginx',
      'nginx -t',
      'systemctl reload nginx',
    ]);
  });

  it('stages the shared env file and installs dependencies for regular builds', async () => {
    const artifact = await makeArtifact(root, 'regular', { buildMode: 'regular' });

    const report = await deployer.deploy(artifact);

    const releaseDir = report.attempt.release?.dir ?? '';
    expect(await readFile(join(releaseDir, '.env'), 'utf8')).toBe('API_KEY=test-secret\nNODE_ENV=production\n');
    const install = host.runner.calls.find((call) => call.line === 'npm ci --omit=dev');
    expect(install?.options).toEqual({ cwd: releaseDir, timeoutMs: 600_000 });

    const ecosystem = await readFile(join(baseDir, 'ecosystem-green.config.cjs'), 'utf8');
    expect(ecosystem).toContain('"API_KEY": "test-secret"');
    expect(ecosystem).toContain(`"script": "${join(baseDir, 'green', 'node_modules/.bin/next')}"`);
    expect(ecosystem).toContain('"3001"');
  });

  it('leaves production serving when the new release fails its health gate', async () => {
    const artifact = await makeArtifact(root, 'artifact');
    await deployer.deploy(artifact);
    const pointerBefore = await readFile(join(baseDir, 'live.json'), 'utf8');
    const nginxBefore = await readFile(nginxConf, 'utf8');
    host.failingPorts.add(3000);

    const report = await deployer.deploy(artifact);

    expect(report.outcome).toBe('health-failed');
    expect(report.exitCode).toBe(1);
    expect(report.error).toMatchObject({ code: 'HealthTimeout', details: { attempts: 3, lastStatus: 503 } });
    expect(await readFile(join(baseDir, 'live.json'), 'utf8')).toBe(pointerBefore);
    expect(await readFile(nginxConf, 'utf8')).toBe(nginxBefore);
    expect([...host.processes]).toEqual([['shop-green', 'online']]);
  });

  it('restores nginx and stops the target when the reload fails', async () => {
    const artifact = await makeArtifact(root, 'artifact');
    await deployer.deploy(artifact);
    const nginxBefore = await readFile(nginxConf, 'utf8');
    host.runner.on('systemctl reload', { exitCode: 1, stderr: 'Job for nginx.service failed' });

    const report = await deployer.deploy(artifact);

    expect(report.error).toMatchObject({ code: 'ProxyReloadError', message: 'nginx reload failed: Job for nginx.service failed' });
    expect(await readFile(nginxConf, 'utf8')).toBe(nginxBefore);
    expect(await readPointerFile()).toMatchObject({ slot: 'B', version: 1 });
    expect(host.processes.has('shop-blue')).toBe(false);
  });

  it('keeps the newest releases plus both slot-bound ones', async () => {
    const artifact = await makeArtifact(root, 'artifact');
    const ids: string[] = [];
    for (let i = 0; i < 5; i++) {
      const report = await deployer.deploy(artifact);
      ids.push(report.attempt.release?.id ?? '');
    }

    const status = await deployer.status();
    expect(status.releases).toEqual([ids[4], ids[3], ids[2]]);
    expect(status.slots.map((slot) => [slot.id, slot.releaseId, slot.live, slot.running])).toEqual([
      ['A', ids[3], false, false],
      ['B', ids[4], true, true],
    ]);
    expect(status.proxyPort).toBe(3001);
  });

  it('redeploys a kept release as a manual rollback', async () => {
    const artifact = await makeArtifact(root, 'artifact');
    const first = await deployer.deploy(artifact);
    await deployer.deploy(artifact);
    const firstId = first.attempt.release?.id ?? '';

    const report = await deployer.redeploy(firstId);

    expect(report.exitCode).toBe(0);
    expect(await readPointerFile()).toMatchObject({ slot: 'B', releaseId: firstId, version: 3 });
    expect(await deployer.proxy.currentPort()).toBe(3001);
  });
});
