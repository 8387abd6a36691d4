/**
 * Filesystem helpers shared by the release store, live pointer and proxy
 * driver. Every replacement goes through a temp path and rename so readers
 * see either the old or the new entry, never a missing one.
 */

import { rename, rm, stat, symlink, writeFile } from 'node:fs/promises';

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

function tempPathFor(path: string): string {
  return `${path}.${process.pid}.tmp`;
}

/**
 * Replace `path` with a symlink to `target`.
 */
export async function swapSymlink(target: string, path: string): Promise<void> {
  const tempPath = tempPathFor(path);
  await rm(tempPath, { force: true });
  await symlink(target, tempPath);
  await rename(tempPath, path);
}

/**
 * Replace the contents of `path`.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = tempPathFor(path);
  try {
    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
