import { describe, it, expect } from 'vitest';
import { SlotResolver } from '../../../src/core/slot-resolver.js';
import { otherSlot, type LivePointerRecord } from '../../../src/types/slot.js';
import { silentLogger, slotTable } from '../../helpers/fixtures.js';

const slots = slotTable('/srv/app');

function resolverFor(record: LivePointerRecord | null): { resolver: SlotResolver; reads: () => number } {
  let reads = 0;
  const pointer = {
    read: async (): Promise<LivePointerRecord | null> => {
      reads++;
      return record;
    },
  };
  return { resolver: new SlotResolver(pointer, slots, silentLogger), reads: () => reads };
}

describe('SlotResolver', () => {
  it('assumes A is live on the first deployment', async () => {
    const { resolver } = resolverFor(null);

    const resolution = await resolver.resolve();

    expect(resolution.current.id).toBe('A');
    expect(resolution.target.id).toBe('B');
    expect(resolution.currentPort).toBe(3000);
    expect(resolution.targetPort).toBe(3001);
    expect(resolution.pointer).toBeNull();
  });

  it('targets A when B is live', async () => {
    const record: LivePointerRecord = {
      version: 3,
      slot: 'B',
      port: 3001,
      releaseId: '20250101120000',
      updatedAt: '2025-01-01T12:00:00.000Z',
    };
    const { resolver } = resolverFor(record);

    const resolution = await resolver.resolve();

    expect(resolution.current).toBe(slots.B);
    expect(resolution.target).toBe(slots.A);
    expect(resolution.pointer).toBe(record);
  });

  it('reads the pointer on every call', async () => {
    const { resolver, reads } = resolverFor(null);

    await resolver.resolve();
    await resolver.resolve();

    expect(reads()).toBe(2);
  });

  it('otherSlot maps each slot to its counterpart', () => {
    expect(otherSlot('A')).toBe('B');
    expect(otherSlot('B')).toBe('A');
  });
});
