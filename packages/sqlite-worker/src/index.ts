/**
 * @sqlite-relay/sqlite-worker - worker entry point for the query relay
 *
 * @packageDocumentation
 * @module @sqlite-relay/sqlite-worker
 */

export * from './protocol.js';
export * from './sqlite-worker.js';
export type * from './types.js';
