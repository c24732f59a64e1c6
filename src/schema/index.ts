/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Env, config files and CLI flags all validate through these schemas.
 */

export * from './target.js';
export * from './config.js';
export * from './response.js';
