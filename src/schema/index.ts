/**
 * Schema module: the single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './config.js';
export * from './protocol.js';
