/**
 * @module @sqlite-relay/worker-coordinator
 * Correlation table for queries forwarded to the leader.
 */

import { QueryTimeoutError, errorFromWireText } from '@sqlite-relay/core';
import type { QueryResponse } from './messages.js';

interface PendingRequest {
  resolve: (result: string) => void;
  reject: (reason: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Maps request ids to the caller waiting on them. An entry settles exactly
 * once: by a matching response or by its timeout, whichever comes first,
 * and is removed at that moment.
 */
export class PendingRequestTable {
  private readonly entries = new Map<string, PendingRequest>();

  constructor(
    private readonly timeoutMs: number,
    private readonly onTimeout?: (queryId: string) => void
  ) {}

  get size(): number {
    return this.entries.size;
  }

  has(queryId: string): boolean {
    return this.entries.has(queryId);
  }

  /**
   * Register a request and return the promise its caller awaits.
   */
  register(queryId: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.entries.delete(queryId)) {
          this.onTimeout?.(queryId);
          reject(new QueryTimeoutError({ queryId }));
        }
      }, this.timeoutMs);

      this.entries.set(queryId, { resolve, reject, timer });
    });
  }

  /**
   * Settle the entry a response refers to. Returns false, with no other
   * effect, when the id is not pending here.
   */
  settle(response: QueryResponse): boolean {
    const pending = this.entries.get(response.queryId);
    if (!pending) return false;

    this.entries.delete(response.queryId);
    clearTimeout(pending.timer);

    if (response.error !== undefined) {
      pending.reject(errorFromWireText(response.error, { queryId: response.queryId }));
    } else {
      pending.resolve(response.result ?? '');
    }
    return true;
  }
}
