/**
 * Configuration Loader
 *
 * Loads configuration from a YAML file with environment-specific overrides
 * and legacy environment variables, then validates the merged result once.
 */

import { readFileSync, existsSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { DEFAULT_CONFIG, ENV_OVERRIDES } from './defaults.js';
import { DeployConfigSchema, type DeployConfig } from '../types/schemas/config.js';
import { ConfigValidationError, errorMessage, zodErrorToConfigError } from '../api/errors.js';

export const DEFAULT_CONFIG_FILE = 'slotswap.yaml';

export type ConfigEnvironment = 'production' | 'development' | 'test';

export interface LoadConfigOptions {
  /** Explicit YAML path; must exist when given */
  configPath?: string;
  /** Selects the `environments.<name>` block (defaults to NODE_ENV, then production) */
  environment?: ConfigEnvironment;
  /** Environment variables to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory searched for slotswap.yaml when no path is given */
  cwd?: string;
}

type PlainRecord = Record<string, unknown>;

function isPlainRecord(value: unknown): value is PlainRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two records. Arrays and scalars in `source` replace `target`.
 */
function deepMerge(target: PlainRecord, source: PlainRecord): PlainRecord {
  const output: PlainRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainRecord(sourceValue) && isPlainRecord(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

function setPath(record: PlainRecord, path: readonly string[], value: unknown): PlainRecord {
  const [head, ...rest] = path;
  if (head === undefined) {
    return record;
  }
  if (rest.length === 0) {
    return { ...record, [head]: value };
  }
  const child = record[head];
  return { ...record, [head]: setPath(isPlainRecord(child) ? child : {}, rest, value) };
}

function resolveEnvironment(
  environment: ConfigEnvironment | undefined,
  env: NodeJS.ProcessEnv
): ConfigEnvironment {
  if (environment) {
    return environment;
  }
  const fromEnv = env.NODE_ENV;
  return fromEnv === 'development' || fromEnv === 'test' ? fromEnv : 'production';
}

function readYamlFile(path: string): PlainRecord {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigValidationError([{ path, message: `could not be parsed: ${errorMessage(error)}` }]);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainRecord(parsed)) {
    throw new ConfigValidationError([{ path, message: 'must contain a YAML mapping' }]);
  }
  return parsed;
}

/**
 * Apply legacy environment variables on top of the merged file config.
 */
export function applyEnvOverrides(config: PlainRecord, env: NodeJS.ProcessEnv): PlainRecord {
  let output = config;

  for (const override of ENV_OVERRIDES) {
    const raw = env[override.variable];
    if (raw === undefined || raw.trim().length === 0) {
      continue;
    }
    const value = override.type === 'number' ? Number(raw.trim()) : raw.trim();
    output = setPath(output, override.path, value);
  }

  return output;
}

/**
 * Merge defaults, YAML file, environment block and env vars (unvalidated).
 */
export function loadRawConfig(options: LoadConfigOptions = {}): PlainRecord {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let fileConfig: PlainRecord = {};
  if (options.configPath) {
    const finalPath = isAbsolute(options.configPath) ? options.configPath : resolve(cwd, options.configPath);
    if (!existsSync(finalPath)) {
      throw new ConfigValidationError([{ path: finalPath, message: 'configuration file not found' }]);
    }
    fileConfig = readYamlFile(finalPath);
  } else {
    const candidate = join(cwd, DEFAULT_CONFIG_FILE);
    if (existsSync(candidate)) {
      fileConfig = readYamlFile(candidate);
    }
  }

  const { environments, ...base } = fileConfig;
  let merged = deepMerge(DEFAULT_CONFIG, base);

  if (isPlainRecord(environments)) {
    const block = environments[resolveEnvironment(options.environment, env)];
    if (isPlainRecord(block)) {
      merged = deepMerge(merged, block);
    }
  }

  return applyEnvOverrides(merged, env);
}

/**
 * Validate configuration values. Every invalid field is reported together.
 */
export function validateConfig(raw: unknown): DeployConfig {
  const parseResult = DeployConfigSchema.safeParse(raw);
  if (!parseResult.success) {
    throw zodErrorToConfigError(parseResult.error);
  }
  return parseResult.data;
}

/**
 * Load and validate configuration in one step.
 */
export function loadConfig(options: LoadConfigOptions = {}): DeployConfig {
  return validateConfig(loadRawConfig(options));
}
