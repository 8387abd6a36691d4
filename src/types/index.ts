/**
 * Main type exports for slotswap
 */

export * from './slot.js';
export * from './release.js';
export * from './schemas/index.js';
