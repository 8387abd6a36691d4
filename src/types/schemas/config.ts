/**
 * Deployment Configuration Schemas
 *
 * Zod schemas for validating slotswap.yaml after defaults, environment
 * overrides and legacy environment variables have been merged in.
 *
 * @module schemas/config
 */

import { isAbsolute, relative, resolve, sep } from 'node:path';
import { z } from 'zod';

const CommandSchema = z.array(z.string().min(1)).min(1, 'must name a command');

/**
 * Application identity and on-disk layout
 */
export const AppConfigSchema = z.object({
  name: z
    .string()
    .regex(/^[a-zA-Z0-9][a-zA-Z0-9._-]*$/, 'must be a process-safe name'),
  base_dir: z.string().startsWith('/', 'must be an absolute path'),
  shared_env_file: z.string().min(1).nullable(),
});

/**
 * Slot Configuration
 */
export const SlotConfigSchema = z.object({
  label: z.string().regex(/^[a-z0-9-]+$/, 'must be lowercase alphanumeric'),
  port: z.number().int().min(1, 'must be >= 1').max(65535, 'must be <= 65535'),
});

export const SlotsConfigSchema = z
  .object({
    a: SlotConfigSchema,
    b: SlotConfigSchema,
  })
  .refine((data) => data.a.port !== data.b.port, {
    message: 'must differ from slots.a.port',
    path: ['b', 'port'],
  })
  .refine((data) => data.a.label !== data.b.label, {
    message: 'must differ from slots.a.label',
    path: ['b', 'label'],
  });

/**
 * Release Store Configuration
 */
export const ReleaseConfigSchema = z.object({
  keep_releases: z.number().int().min(1, 'must be >= 1'),
  dir: z.string().min(1),
  install_command: CommandSchema.nullable(),
  install_timeout_ms: z.number().int().positive('must be positive'),
});

/**
 * Health Gate Configuration
 */
export const HealthConfigSchema = z.object({
  path: z.string().startsWith('/', 'must start with /'),
  expected_status: z.number().int().min(100, 'must be >= 100').max(599, 'must be <= 599'),
  timeout_seconds: z.number().int().min(1, 'must be >= 1'),
  interval_ms: z.number().int().positive('must be positive'),
  request_timeout_ms: z.number().int().positive('must be positive'),
  stop_failed_target: z.boolean(),
});

export const SettleConfigSchema = z.object({
  grace_delay_ms: z.number().int().min(0, 'must be >= 0'),
});

export const EntrypointSchema = z.object({
  script: z.string().min(1),
  args: z.array(z.string()),
});

/**
 * Process Supervisor Configuration
 */
export const SupervisorConfigSchema = z.object({
  driver: z.literal('pm2'),
  pm2_bin: z.string().min(1),
  max_memory_restart: z.string().regex(/^\d+[KMG]$/, 'must look like 500M'),
  log_dir: z.string().min(1),
  entrypoints: z.object({
    standalone: EntrypointSchema,
    regular: EntrypointSchema,
  }),
});

/**
 * Reverse Proxy Configuration
 */
export const ProxyConfigSchema = z.object({
  driver: z.enum(['nginx', 'none']),
  config_path: z.string().startsWith('/', 'must be an absolute path'),
  test_command: CommandSchema,
  reload_command: CommandSchema,
  upstream_host: z.string().min(1),
  listen_port: z.number().int().min(1).max(65535),
  server_names: z.array(z.string().min(1)),
  keepalive: z.number().int().min(0),
  static_url_prefix: z.string().startsWith('/', 'must start with /'),
  static_subdir: z.string().min(1),
  cache_max_age: z.number().int().min(0),
});

export const MaintenanceConfigSchema = z.object({
  min_free_space_gb: z.number().min(0, 'must be >= 0'),
  cleanup_commands: z.array(CommandSchema),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/** Entries under base_dir that slotswap manages itself */
const FIXED_BASE_ENTRIES = ['current', 'live.json'];

/**
 * First path segment under `baseDir` that `path` occupies, or null when it
 * lies outside.
 */
function baseEntry(baseDir: string, path: string): string | null {
  const rel = relative(baseDir, resolve(baseDir, path));
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }
  return rel.split(sep)[0] ?? null;
}

/**
 * Full deployment configuration
 */
export const DeployConfigSchema = z
  .object({
    app: AppConfigSchema,
    slots: SlotsConfigSchema,
    release: ReleaseConfigSchema,
    health: HealthConfigSchema,
    settle: SettleConfigSchema,
    supervisor: SupervisorConfigSchema,
    proxy: ProxyConfigSchema,
    maintenance: MaintenanceConfigSchema,
    logging: LoggingConfigSchema,
  })
  .superRefine((data, ctx) => {
    const baseDir = data.app.base_dir;
    const reserved = new Set(FIXED_BASE_ENTRIES);
    for (const path of [data.release.dir, data.supervisor.log_dir, data.app.shared_env_file]) {
      const entry = path === null ? null : baseEntry(baseDir, path);
      if (entry !== null) {
        reserved.add(entry);
      }
    }

    for (const key of ['a', 'b'] as const) {
      const { label } = data.slots[key];
      if (reserved.has(label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `collides with ${baseDir}/${label}, which slotswap already uses`,
          path: ['slots', key, 'label'],
        });
      }
    }
  });

export type DeployConfig = z.infer<typeof DeployConfigSchema>;
export type EntrypointConfig = z.infer<typeof EntrypointSchema>;
