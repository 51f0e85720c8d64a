/**
 * CareLens Types Package
 *
 * Zod schemas and inferred types shared by the orchestration core and the
 * surfaces built on it (API handlers, dashboard sockets, push workers).
 *
 * @module @carelens/types
 */

export * from './schemas/common.js';
export * from './schemas/analysis.js';
export * from './schemas/broadcast.js';
export * from './schemas/orchestration.js';
