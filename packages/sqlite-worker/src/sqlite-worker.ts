/**
 * @module @sqlite-relay/sqlite-worker
 * Wires the coordinator into a worker: defaults in, page messages out.
 */

import { errorMessage } from '@sqlite-relay/core';
import { createSqlJsStorage } from '@sqlite-relay/storage-sqlite';
import { createWorkerCoordinator, type WorkerCoordinator } from '@sqlite-relay/worker-coordinator';
import { executeRequestSchema, type ExecuteReply } from './protocol.js';
import type { SqliteWorkerConfig, WorkerScopeLike } from './types.js';

/**
 * Build a coordinator from defaults and start it.
 *
 * @example
 * ```typescript
 * // worker.ts
 * const coordinator = createSqliteWorker({ sqlite: { foreignKeys: true } });
 * exposeSqliteWorker(self, coordinator);
 * ```
 */
export function createSqliteWorker(config: SqliteWorkerConfig = {}): WorkerCoordinator {
  const { sqlite, storage, ...coordinatorConfig } = config;
  const coordinator = createWorkerCoordinator({
    ...coordinatorConfig,
    storage: storage ?? createSqlJsStorage(sqlite),
  });
  coordinator.start();
  return coordinator;
}

/**
 * Answer `execute` requests arriving on the worker's own port. Messages of
 * any other shape are ignored. Returns a function that stops listening.
 */
export function exposeSqliteWorker(scope: WorkerScopeLike, coordinator: WorkerCoordinator): () => void {
  const listener = (event: { data: unknown }): void => {
    const parsed = executeRequestSchema.safeParse(event.data);
    if (!parsed.success) return;

    const { id, sql } = parsed.data;
    void coordinator
      .executeQuery(sql)
      .then(
        (result): ExecuteReply => ({ type: 'result', id, result }),
        (error: unknown): ExecuteReply => ({ type: 'error', id, error: errorMessage(error) })
      )
      .then((reply) => scope.postMessage(reply));
  };

  scope.addEventListener('message', listener);
  return () => scope.removeEventListener('message', listener);
}
