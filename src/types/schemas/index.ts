/**
 * Zod schema exports for slotswap configuration and artifact metadata.
 */

export * from './config.js';
export * from './metadata.js';
