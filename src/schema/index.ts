/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './step.js';
export * from './scenario.js';
export * from './analysis.js';
export * from './results.js';
export * from './config.js';
export * from './jsonOutput.js';
