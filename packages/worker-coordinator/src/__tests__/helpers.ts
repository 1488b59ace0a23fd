import type { DatabaseHandle, StorageInitializer } from '@sqlite-relay/core';
import { createBroadcastRegistry, createInProcessBroadcastAdapter } from '../broadcast-adapter.js';
import type { BroadcastRegistry } from '../broadcast-adapter.js';
import { WorkerCoordinator } from '../coordinator.js';
import { InProcessLockProvider, createLockRegistry } from '../lock-provider.js';
import type { LockRegistry } from '../lock-provider.js';
import type { CoordinatorConfig } from '../types.js';

export const CHANNEL = 'sqlite-queries';

/** Let every queued microtask (bus deliveries, lock grants) run. */
export function flush(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

/**
 * Engine stand-in: `SELECT 1` gives the usual row, `FAIL <text>` rejects
 * with that text, anything else echoes the statement.
 */
export class FakeDatabase implements DatabaseHandle {
  readonly executed: string[] = [];
  closeCalls = 0;

  async execute(sql: string): Promise<string> {
    this.executed.push(sql);
    if (sql === 'SELECT 1') return '[{"1":1}]';
    if (sql.startsWith('FAIL ')) throw new Error(sql.slice(5));
    return JSON.stringify([{ sql }]);
  }

  close(): void {
    this.closeCalls++;
  }
}

export class FakeStorage implements StorageInitializer<FakeDatabase> {
  readonly database = new FakeDatabase();
  initializeCalls = 0;
  private finishOpen: (() => void) | null = null;

  constructor(private readonly behavior: 'ready' | 'fail' | 'hang' | 'deferred' = 'ready') {}

  /** Complete a `deferred` initialization */
  completeInitialize(): void {
    this.finishOpen?.();
  }

  initialize(): Promise<FakeDatabase> {
    this.initializeCalls++;
    switch (this.behavior) {
      case 'fail':
        return Promise.reject(new Error('OPFS unavailable'));
      case 'hang':
        return new Promise<FakeDatabase>(() => {});
      case 'deferred':
        return new Promise<FakeDatabase>((resolve) => {
          this.finishOpen = () => resolve(this.database);
        });
      default:
        return Promise.resolve(this.database);
    }
  }
}

export function sequentialIds(prefix: string): () => string {
  let counter = 0;
  return () => `${prefix}-${counter++}`;
}

/**
 * A group of contexts sharing one bus and one lock registry, isolated from
 * other tests.
 */
export class TestOrigin {
  readonly bus: BroadcastRegistry = createBroadcastRegistry();
  readonly lockRegistry: LockRegistry = createLockRegistry();
  readonly locks = new InProcessLockProvider(this.lockRegistry);
  private readonly contexts: WorkerCoordinator[] = [];

  spawn(name: string, overrides: Partial<CoordinatorConfig> = {}): WorkerCoordinator {
    const coordinator = new WorkerCoordinator({
      storage: new FakeStorage(),
      transport: createInProcessBroadcastAdapter(CHANNEL, this.bus),
      locks: this.locks,
      generateId: sequentialIds(name),
      ...overrides,
    });
    this.contexts.push(coordinator);
    return coordinator;
  }

  /** Raw bus access for injecting and observing messages */
  tap(): { post(message: unknown): void; received: unknown[]; close(): void } {
    const adapter = createInProcessBroadcastAdapter(CHANNEL, this.bus);
    const received: unknown[] = [];
    adapter.onMessage((data) => received.push(data));
    return {
      post: (message: unknown) => adapter.postMessage(message),
      received,
      close: () => adapter.close(),
    };
  }

  closeAll(): void {
    for (const context of this.contexts) {
      context.close();
    }
  }
}
