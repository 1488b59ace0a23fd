/**
 * @module @sqlite-relay/core
 * Shared errors, logging and storage contracts for the query relay.
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';
