/**
 * Default Configuration
 *
 * Every field of DeployConfig with its documented default. The YAML file,
 * its environment block and legacy environment variables are merged on top.
 */

import type { DeployConfig } from '../types/schemas/config.js';

export const DEFAULT_CONFIG: DeployConfig = {
  app: {
    name: 'my-app',
    /** Releases, slot aliases, live pointer and logs live under here */
    base_dir: '/opt/apps/my-app',
    /** Relative paths resolve against base_dir; null disables the copy */
    shared_env_file: 'shared/.env',
  },
  slots: {
    a: { label: 'blue', port: 3000 },
    b: { label: 'green', port: 3001 },
  },
  release: {
    keep_releases: 3,
    dir: 'releases',
    /** Only run for `regular` builds */
    install_command: ['npm', 'ci', '--omit=dev'],
    install_timeout_ms: 600_000, // 10 minutes
  },
  health: {
    path: '/api/health',
    expected_status: 200,
    /** One attempt per interval; this is the attempt budget */
    timeout_seconds: 30,
    interval_ms: 1_000,
    request_timeout_ms: 2_000,
    stop_failed_target: true,
  },
  settle: {
    grace_delay_ms: 10_000,
  },
  supervisor: {
    driver: 'pm2',
    pm2_bin: 'pm2',
    max_memory_restart: '500M',
    log_dir: 'logs',
    entrypoints: {
      standalone: { script: 'server.js', args: [] },
      regular: { script: 'node_modules/.bin/next', args: ['start', '-p', '{port}'] },
    },
  },
  proxy: {
    driver: 'nginx',
    config_path: '/etc/nginx/conf.d/my-app.conf',
    test_command: ['nginx', '-t'],
    reload_command: ['systemctl', 'reload', 'nginx'],
    upstream_host: '127.0.0.1',
    listen_port: 80,
    server_names: [],
    keepalive: 64,
    static_url_prefix: '/_next/static',
    static_subdir: '.next/static',
    cache_max_age: 31_536_000, // 1 year
  },
  maintenance: {
    min_free_space_gb: 3,
    cleanup_commands: [
      ['npm', 'cache', 'clean', '--force'],
      ['journalctl', '--vacuum-time=2d'],
    ],
  },
  logging: {
    level: 'info',
  },
};

/**
 * Legacy environment variables and the config path each one overrides.
 */
export const ENV_OVERRIDES: ReadonlyArray<{
  variable: string;
  path: readonly string[];
  type: 'string' | 'number';
}> = [
  { variable: 'APP_NAME', path: ['app', 'name'], type: 'string' },
  { variable: 'DEPLOY_BASE_DIR', path: ['app', 'base_dir'], type: 'string' },
  { variable: 'APP_PORT', path: ['slots', 'a', 'port'], type: 'number' },
  { variable: 'STAGING_PORT', path: ['slots', 'b', 'port'], type: 'number' },
  { variable: 'KEEP_RELEASES', path: ['release', 'keep_releases'], type: 'number' },
  { variable: 'HEALTH_CHECK_PATH', path: ['health', 'path'], type: 'string' },
  { variable: 'HEALTH_CHECK_TIMEOUT', path: ['health', 'timeout_seconds'], type: 'number' },
  { variable: 'HEALTH_CHECK_EXPECTED_STATUS', path: ['health', 'expected_status'], type: 'number' },
  { variable: 'SLOTSWAP_LOG_LEVEL', path: ['logging', 'level'], type: 'string' },
];
