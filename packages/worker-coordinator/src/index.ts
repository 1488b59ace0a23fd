/**
 * @module @sqlite-relay/worker-coordinator
 * Single-writer coordination for a database shared by many worker contexts:
 * lock-based leader election, a broadcast message router, request
 * correlation with timeouts, and the `executeQuery` entry point.
 */

export * from './broadcast-adapter.js';
export * from './coordinator.js';
export * from './leader-election.js';
export * from './lock-provider.js';
export * from './message-router.js';
export * from './messages.js';
export * from './pending-requests.js';
export type * from './types.js';
