/**
 * LivePointer
 *
 * The single indirection naming the slot that serves production traffic.
 * Persisted as a versioned JSON record (rewritten through a temp file and
 * rename) plus a `current` alias to the live slot's directory, which the
 * proxy uses for static assets. The record is authoritative; the alias is
 * only consulted when no record exists (hosts laid out before the record).
 *
 * Read once per attempt by the slot resolver and written only by the
 * traffic switch.
 */

import { mkdir, readFile, readlink, rm } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { SLOT_IDS, type LivePointerRecord, type SlotBinding, type SlotTable } from '../types/slot.js';
import { LivePointerError, errorMessage } from '../api/errors.js';
import { isErrnoCode, swapSymlink, writeFileAtomic } from '../utils/fs-helpers.js';

const LivePointerRecordSchema = z.object({
  version: z.number().int().min(0),
  slot: z.enum(['A', 'B']),
  port: z.number().int(),
  releaseId: z.string().nullable(),
  updatedAt: z.string(),
});

export interface LivePointerOptions {
  file: string;
  currentAlias: string;
  slots: SlotTable;
  logger?: Logger;
  now?: () => Date;
}

export class LivePointer {
  private readonly options: LivePointerOptions;
  private readonly logger?: Logger;

  constructor(options: LivePointerOptions) {
    this.options = options;
    this.logger = options.logger?.child({ component: 'LivePointer' });
  }

  /**
   * Read the pointer. Returns null when no live slot exists yet or the
   * record cannot be interpreted.
   */
  async read(): Promise<LivePointerRecord | null> {
    const record = await this.readRecord();
    if (record) {
      return record;
    }
    return this.readAlias();
  }

  /**
   * Point production at `slot`. Alias first, record last: the record write
   * is the commit. If the record cannot be written the alias is put back to
   * where it pointed before, so a pointer that falls back to the alias still
   * names the slot the proxy routes to.
   */
  async write(slot: SlotBinding, releaseId: string | null): Promise<LivePointerRecord> {
    const previous = await this.readRecord();
    const record: LivePointerRecord = {
      version: (previous?.version ?? 0) + 1,
      slot: slot.id,
      port: slot.port,
      releaseId,
      updatedAt: (this.options.now ?? (() => new Date()))().toISOString(),
    };

    const { file, currentAlias } = this.options;
    const previousAlias = await this.readAliasTarget();
    let swapped = false;

    try {
      await mkdir(dirname(file), { recursive: true });
      await swapSymlink(slot.dir, currentAlias);
      swapped = true;
      await writeFileAtomic(file, `${JSON.stringify(record, null, 2)}\n`);
    } catch (error) {
      if (swapped) {
        await this.restoreAlias(previousAlias);
      }
      throw new LivePointerError(`Failed to update live pointer to slot ${slot.id}: ${errorMessage(error)}`, {
        slot: slot.id,
        file,
      });
    }

    this.logger?.info({ slot: slot.id, port: slot.port, version: record.version }, 'Live pointer updated');
    return record;
  }

  private async restoreAlias(target: string | null): Promise<void> {
    const { currentAlias } = this.options;
    try {
      if (target === null) {
        await rm(currentAlias, { force: true });
      } else {
        await swapSymlink(target, currentAlias);
      }
    } catch (error) {
      this.logger?.error(
        { alias: currentAlias, target, err: errorMessage(error) },
        'Failed to restore live alias; alias and proxy may disagree'
      );
    }
  }

  /** Raw target of the alias, or null when there is no alias */
  private async readAliasTarget(): Promise<string | null> {
    try {
      return await readlink(this.options.currentAlias);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'EINVAL')) {
        return null;
      }
      throw new LivePointerError(`Failed to read live alias: ${errorMessage(error)}`, {
        alias: this.options.currentAlias,
      });
    }
  }

  private async readRecord(): Promise<LivePointerRecord | null> {
    let content: string;
    try {
      content = await readFile(this.options.file, 'utf8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return null;
      }
      throw new LivePointerError(`Failed to read live pointer: ${errorMessage(error)}`, {
        file: this.options.file,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      this.logger?.warn({ file: this.options.file }, 'Live pointer record is not valid JSON; ignoring it');
      return null;
    }

    const result = LivePointerRecordSchema.safeParse(parsed);
    if (!result.success) {
      this.logger?.warn(
        { file: this.options.file, issues: result.error.issues.map((i) => i.message) },
        'Live pointer record is malformed; ignoring it'
      );
      return null;
    }
    return result.data;
  }

  private async readAlias(): Promise<LivePointerRecord | null> {
    const target = await this.readAliasTarget();
    if (target === null) {
      return null;
    }

    const resolved = resolve(dirname(this.options.currentAlias), target);
    for (const id of SLOT_IDS) {
      const slot = this.options.slots[id];
      if (resolve(slot.dir) === resolved) {
        return {
          version: 0,
          slot: id,
          port: slot.port,
          releaseId: null,
          updatedAt: new Date(0).toISOString(),
        };
      }
    }

    this.logger?.warn({ alias: this.options.currentAlias, target }, 'Live alias names no known slot; ignoring it');
    return null;
  }
}
