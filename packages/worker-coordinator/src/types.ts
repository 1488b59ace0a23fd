/**
 * @module @sqlite-relay/worker-coordinator
 * Types for single-writer coordination across worker contexts.
 */

import type { DatabaseHandle, RelayLogger, StorageInitializer } from '@sqlite-relay/core';

/**
 * Origin-wide publish/subscribe bus. Every subscriber may see every message;
 * relevance is decided by the receiver.
 */
export interface BroadcastAdapter {
  postMessage(message: unknown): void;
  onMessage(handler: (data: unknown) => void): () => void;
  close(): void;
}

export interface LockRequestOptions {
  /** Abandons the request while it is still queued */
  signal?: AbortSignal;
}

/**
 * Exclusive named lock service. The lock is held while the promise
 * returned by `callback` is pending and released when it settles.
 */
export interface LockProvider {
  request<T>(name: string, callback: () => Promise<T>, options?: LockRequestOptions): Promise<T>;
}

export type ElectionStatus = 'idle' | 'waiting' | 'leader' | 'failed' | 'closed';

export interface CoordinatorConfig {
  /** Opens the database once this context becomes leader */
  storage: StorageInitializer;
  /** Broadcast bus name (default: 'sqlite-queries') */
  channelName?: string;
  /** Exclusive lock name (default: 'sqlite-database') */
  lockName?: string;
  /** Follower wait for a response in ms (default: 5000) */
  queryTimeoutMs?: number;
  /** Force debug logging (default: false) */
  debug?: boolean;
  /** Bus override; defaults to BroadcastChannel, else an in-process bus */
  transport?: BroadcastAdapter;
  /** Lock service override; defaults to Web Locks, else an in-process registry */
  locks?: LockProvider;
  logger?: RelayLogger;
  /** Id source for the worker and for forwarded requests */
  generateId?: () => string;
}

export interface CoordinatorState {
  workerId: string;
  isLeader: boolean;
  databaseReady: boolean;
  closed: boolean;
}

export type CoordinatorEventType =
  | 'leadership-acquired'
  | 'database-ready'
  | 'database-failed'
  | 'lock-failed'
  | 'leader-announced'
  | 'query-timeout'
  | 'message-dropped';

export interface CoordinatorEvent {
  type: CoordinatorEventType;
  /** Leader id, query id, or the dropped payload, depending on type */
  data?: unknown;
  timestamp: number;
}

export interface CoordinatorStats {
  /** Queries run against the local handle, for local and forwarded callers */
  readonly executedLocally: number;
  /** Queries this context sent to the leader */
  readonly forwarded: number;
  /** Forwarded queries from other contexts this leader answered */
  readonly served: number;
  readonly timedOut: number;
  readonly droppedMessages: number;
  readonly pendingRequests: number;
}

export type { DatabaseHandle, StorageInitializer };
