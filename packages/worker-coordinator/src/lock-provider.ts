/**
 * @module @sqlite-relay/worker-coordinator
 * Exclusive named locks: the Web Locks API where the platform offers it,
 * otherwise a first-come-first-served registry inside the process.
 */

import type { LockProvider, LockRequestOptions } from './types.js';

interface LockWaiter {
  grant(): void;
}

interface LockQueue {
  holder: LockWaiter | null;
  waiting: LockWaiter[];
}

/** Lock queues per lock name */
export type LockRegistry = Map<string, LockQueue>;

const sharedLockRegistry: LockRegistry = new Map();

export function createLockRegistry(): LockRegistry {
  return new Map();
}

function createAbortError(): DOMException {
  return new DOMException('The lock request was aborted.', 'AbortError');
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * In-process lock service with the Web Locks contract: one holder per name,
 * waiters granted in request order when the holder's callback settles.
 */
export class InProcessLockProvider implements LockProvider {
  constructor(private readonly registry: LockRegistry = sharedLockRegistry) {}

  request<T>(name: string, callback: () => Promise<T>, options: LockRequestOptions = {}): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(createAbortError());
    }

    const queue = this.queueFor(name);

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const index = queue.waiting.indexOf(waiter);
        if (index !== -1) {
          queue.waiting.splice(index, 1);
          reject(createAbortError());
        }
      };

      const waiter: LockWaiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          void Promise.resolve()
            .then(callback)
            .then(resolve, reject)
            .finally(() => this.release(name, waiter));
        },
      };

      if (queue.holder === null) {
        queue.holder = waiter;
        waiter.grant();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
        queue.waiting.push(waiter);
      }
    });
  }

  /** Whether any context currently holds the named lock */
  isHeld(name: string): boolean {
    return (this.registry.get(name)?.holder ?? null) !== null;
  }

  /** Number of requests queued behind the holder */
  pendingCount(name: string): number {
    return this.registry.get(name)?.waiting.length ?? 0;
  }

  private queueFor(name: string): LockQueue {
    let queue = this.registry.get(name);
    if (!queue) {
      queue = { holder: null, waiting: [] };
      this.registry.set(name, queue);
    }
    return queue;
  }

  private release(name: string, waiter: LockWaiter): void {
    const queue = this.registry.get(name);
    if (!queue || queue.holder !== waiter) return;

    const next = queue.waiting.shift();
    if (next) {
      queue.holder = next;
      next.grant();
    } else {
      this.registry.delete(name);
    }
  }
}

export function createInProcessLockProvider(registry?: LockRegistry): InProcessLockProvider {
  return new InProcessLockProvider(registry);
}

/** The part of the Web Locks API used here */
export interface WebLockManager {
  request(
    name: string,
    options: { mode: 'exclusive'; signal?: AbortSignal },
    callback: () => Promise<unknown>
  ): Promise<unknown>;
}

/**
 * Lock service backed by `navigator.locks`.
 */
export function createWebLockProvider(locks: WebLockManager = navigator.locks): LockProvider {
  return {
    request<T>(name: string, callback: () => Promise<T>, options: LockRequestOptions = {}): Promise<T> {
      return new Promise<T>((resolve, reject) => {
        locks
          .request(name, { mode: 'exclusive', signal: options.signal }, () => callback().then(resolve, reject))
          .catch(reject);
      });
    },
  };
}

export function isWebLocksAvailable(): boolean {
  return typeof navigator !== 'undefined' && typeof navigator.locks?.request === 'function';
}

/**
 * Creates a lock provider: Web Locks where available, otherwise the
 * in-process registry.
 */
export function createLockProvider(): LockProvider {
  return isWebLocksAvailable() ? createWebLockProvider() : createInProcessLockProvider();
}
