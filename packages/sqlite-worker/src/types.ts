import type { CoordinatorConfig } from '@sqlite-relay/worker-coordinator';
import type { SqlJsStorageConfig } from '@sqlite-relay/storage-sqlite';

export interface SqliteWorkerConfig extends Omit<CoordinatorConfig, 'storage'> {
  /** Storage override; defaults to sql.js built from `sqlite` */
  storage?: CoordinatorConfig['storage'];
  /** Options for the default sql.js storage */
  sqlite?: SqlJsStorageConfig;
}

/** Minimal worker global scope for testability */
export interface WorkerScopeLike {
  postMessage(message: unknown): void;
  addEventListener(type: 'message', listener: (event: { data: unknown }) => void): void;
  removeEventListener(type: 'message', listener: (event: { data: unknown }) => void): void;
}
