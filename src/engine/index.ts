/**
 * Charge Engine Export
 *
 * Pure and synchronous: every rate and consumption slot is in memory before
 * calculation starts.
 */

export * from './errors.js';
export * from './bucket.engine.js';
export * from './rate.engine.js';
export * from './charge.engine.js';
export * from './comparison.engine.js';
