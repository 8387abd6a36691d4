/**
 * Slot Resolver
 *
 * Decides which slot is live and which receives the next release. A pointer
 * naming B makes B current and A the target; every other state (no pointer,
 * malformed record, A) resolves to current A, target B, so the first-ever
 * deployment needs no special case.
 */

import type { Logger } from 'pino';
import { otherSlot, type SlotId, type SlotResolution, type SlotTable } from '../types/slot.js';
import type { LivePointer } from './live-pointer.js';

export class SlotResolver {
  private readonly pointer: Pick<LivePointer, 'read'>;
  private readonly slots: SlotTable;
  private readonly logger?: Logger;

  constructor(pointer: Pick<LivePointer, 'read'>, slots: SlotTable, logger?: Logger) {
    this.pointer = pointer;
    this.slots = slots;
    this.logger = logger?.child({ component: 'SlotResolver' });
  }

  /**
   * Read the pointer (never cached) and derive current/target.
   */
  async resolve(): Promise<SlotResolution> {
    const record = await this.pointer.read();
    const currentId: SlotId = record?.slot === 'B' ? 'B' : 'A';
    const current = this.slots[currentId];
    const target = this.slots[otherSlot(currentId)];

    this.logger?.info(
      {
        current: current.label,
        currentPort: current.port,
        target: target.label,
        targetPort: target.port,
        pointerVersion: record?.version ?? null,
      },
      record ? 'Resolved slots from live pointer' : 'No live pointer; assuming first deployment'
    );

    return {
      current,
      target,
      currentPort: current.port,
      targetPort: target.port,
      pointer: record,
    };
  }
}
