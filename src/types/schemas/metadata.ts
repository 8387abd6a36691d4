/**
 * Artifact metadata (`DEPLOY_META`) schema.
 *
 * The record is a list of KEY=VALUE lines written by the packaging step.
 */

import { z } from 'zod';
import type { ReleaseMetadata } from '../release.js';

export const DeployMetaSchema = z.object({
  TIMESTAMP: z.string().regex(/^\d{14}$/, 'must be YYYYMMDDHHmmss'),
  BUILD_MODE: z.enum(['standalone', 'regular']),
  NODE_VERSION: z.string().optional(),
  PACKAGE_MANAGER: z.string().optional(),
  GIT_COMMIT: z.string().optional(),
});

export type DeployMeta = z.infer<typeof DeployMetaSchema>;

function unquote(value: string): string {
  const first = value[0];
  if (value.length >= 2 && (first === '"' || first === "'") && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Split KEY=VALUE lines. Blank lines and `#` comments are skipped; the first
 * `=` separates key from value and one pair of matching quotes around the
 * value is removed.
 */
export function parseKeyValueLines(content: string): Record<string, string> {
  const record: Record<string, string> = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator <= 0) {
      continue;
    }

    record[line.slice(0, separator).trim()] = unquote(line.slice(separator + 1).trim());
  }

  return record;
}

export function toReleaseMetadata(meta: DeployMeta): ReleaseMetadata {
  return {
    timestamp: meta.TIMESTAMP,
    buildMode: meta.BUILD_MODE,
    runtimeVersion: meta.NODE_VERSION,
    packageManager: meta.PACKAGE_MANAGER,
    commitHash: meta.GIT_COMMIT,
  };
}
