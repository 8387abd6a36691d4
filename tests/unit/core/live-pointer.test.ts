import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readlink, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { LivePointer } from '../../../src/core/live-pointer.js';
import { LivePointerError } from '../../../src/api/errors.js';
import type { SlotTable } from '../../../src/types/slot.js';
import { makeTempDir, removeDir, silentLogger, slotTable } from '../../helpers/fixtures.js';

describe('LivePointer', () => {
  let baseDir: string;
  let slots: SlotTable;
  let pointer: LivePointer;

  beforeEach(async () => {
    baseDir = await makeTempDir();
    slots = slotTable(baseDir);
    pointer = new LivePointer({
      file: join(baseDir, 'live.json'),
      currentAlias: join(baseDir, 'current'),
      slots,
      logger: silentLogger,
      now: () => new Date('2025-03-01T08:00:00.000Z'),
    });
  });

  afterEach(async () => {
    await removeDir(baseDir);
  });

  it('returns null when neither record nor alias exists', async () => {
    expect(await pointer.read()).toBeNull();
  });

  it('writes a versioned record and swaps the current alias', async () => {
    const record = await pointer.write(slots.B, '20250301080000');

    expect(record).toEqual({
      version: 1,
      slot: 'B',
      port: 3001,
      releaseId: '20250301080000',
      updatedAt: '2025-03-01T08:00:00.000Z',
    });
    expect(JSON.parse(await readFile(join(baseDir, 'live.json'), 'utf8'))).toEqual(record);
    expect(await readlink(join(baseDir, 'current'))).toBe(slots.B.dir);
    expect(await pointer.read()).toEqual(record);
  });

  it('increments the version on every write', async () => {
    await pointer.write(slots.B, null);
    await pointer.write(slots.A, null);
    const third = await pointer.write(slots.B, null);

    expect(third.version).toBe(3);
    expect(await readlink(join(baseDir, 'current'))).toBe(slots.B.dir);
  });

  it('ignores a malformed record and falls back to the alias', async () => {
    await writeFile(join(baseDir, 'live.json'), '{ not json', 'utf8');
    await symlink(slots.B.dir, join(baseDir, 'current'));

    expect(await pointer.read()).toEqual({
      version: 0,
      slot: 'B',
      port: 3001,
      releaseId: null,
      updatedAt: '1970-01-01T00:00:00.000Z',
    });
  });

  it('ignores a record whose slot is unknown', async () => {
    await writeFile(
      join(baseDir, 'live.json'),
      JSON.stringify({ version: 4, slot: 'C', port: 3002, releaseId: null, updatedAt: 'x' }),
      'utf8'
    );

    expect(await pointer.read()).toBeNull();
  });

  it('treats a dangling alias to an unknown directory as absent', async () => {
    await symlink(join(baseDir, 'elsewhere'), join(baseDir, 'current'));

    expect(await pointer.read()).toBeNull();
  });

  it('keeps counting versions from a record written before', async () => {
    await writeFile(
      join(baseDir, 'live.json'),
      JSON.stringify({ version: 41, slot: 'A', port: 3000, releaseId: null, updatedAt: '2025-01-01T00:00:00.000Z' }),
      'utf8'
    );

    const record = await pointer.write(slots.B, null);
    expect(record.version).toBe(42);
  });

  it('wraps write failures in LivePointerError', async () => {
    // A directory where the record file should go makes the rename fail.
    await mkdir(join(baseDir, 'live.json'));

    await expect(pointer.write(slots.B, null)).rejects.toBeInstanceOf(LivePointerError);
  });

  describe('when the record cannot be written', () => {
    beforeEach(async () => {
      // A non-empty directory at the record's temp path makes the write fail.
      const tempPath = join(baseDir, `live.json.${process.pid}.tmp`);
      await mkdir(tempPath);
      await writeFile(join(tempPath, 'occupied'), 'x', 'utf8');
    });

    it('removes the alias it created on a first write', async () => {
      await expect(pointer.write(slots.B, '20250301080000')).rejects.toBeInstanceOf(LivePointerError);

      await expect(readlink(join(baseDir, 'current'))).rejects.toMatchObject({ code: 'ENOENT' });
      expect(await pointer.read()).toBeNull();
    });

    it('points the alias back at the previous slot', async () => {
      await symlink(slots.A.dir, join(baseDir, 'current'));

      await expect(pointer.write(slots.B, '20250301080000')).rejects.toBeInstanceOf(LivePointerError);

      expect(await readlink(join(baseDir, 'current'))).toBe(slots.A.dir);
      expect(await pointer.read()).toMatchObject({ slot: 'A', port: 3000 });
    });
  });
});
