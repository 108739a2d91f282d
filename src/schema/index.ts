/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './action.js';
export * from './plan.js';
export * from './trace.js';
export * from './config.js';
export * from './report.js';
