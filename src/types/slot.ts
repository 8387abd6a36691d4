/**
 * Slot Types
 *
 * The two fixed deployment locations that alternately host the live release.
 * Slot identity, port and working-directory alias never change; only the
 * release behind the alias does.
 */

/**
 * Slot identity. Exactly two variants exist.
 */
export type SlotId = 'A' | 'B';

export const SLOT_IDS: readonly SlotId[] = ['A', 'B'] as const;

/**
 * Map a slot to its counterpart.
 */
export function otherSlot(id: SlotId): SlotId {
  return id === 'A' ? 'B' : 'A';
}

export function isSlotId(value: unknown): value is SlotId {
  return value === 'A' || value === 'B';
}

/**
 * A slot bound to its fixed port and working-directory alias.
 */
export interface SlotBinding {
  id: SlotId;
  /** Process-name suffix (`<app>-<label>`), e.g. `blue` */
  label: string;
  /** Fixed listening port */
  port: number;
  /** Working-directory alias (symlink to a release directory) */
  dir: string;
}

/**
 * Both slots, keyed by identity.
 */
export type SlotTable = Readonly<Record<SlotId, SlotBinding>>;

/**
 * Output of the slot resolver for a single deployment attempt.
 */
export interface SlotResolution {
  current: SlotBinding;
  target: SlotBinding;
  currentPort: number;
  targetPort: number;
  /** Record the decision was made from, `null` when no live slot exists yet */
  pointer: LivePointerRecord | null;
}

/**
 * Persisted LivePointer state.
 */
export interface LivePointerRecord {
  /** Incremented on every write */
  version: number;
  slot: SlotId;
  port: number;
  releaseId: string | null;
  updatedAt: string;
}
