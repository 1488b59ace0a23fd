/**
 * @module @sqlite-relay/worker-coordinator
 * Leader election on an exclusive named lock.
 */

import { BehaviorSubject } from 'rxjs';
import type { Observable } from 'rxjs';
import { LockAcquisitionError, errorMessage } from '@sqlite-relay/core';
import type { RelayLogger } from '@sqlite-relay/core';
import { isAbortError } from './lock-provider.js';
import type { ElectionStatus, LockProvider } from './types.js';

export interface LeaderElectionOptions {
  lockName: string;
  locks: LockProvider;
  logger: RelayLogger;
  /** Runs once, synchronously, when the lock is granted */
  onElected: () => void;
  /** Runs when the lock request itself fails */
  onLockFailed?: (error: LockAcquisitionError) => void;
}

export interface LeaderElection {
  /**
   * Queue for the lock. Fire-and-forget: the outcome only shows through
   * `onElected` and `status$`.
   */
  attemptLeadership(): void;
  /** Give the lock back (or leave the queue); used on context teardown */
  release(): void;
  getStatus(): ElectionStatus;
  status$: Observable<ElectionStatus>;
}

/**
 * The granted callback never completes on its own, so the winner keeps the
 * lock until `release()` or the end of the context. The platform then
 * grants it to the next waiter, which runs the same election.
 */
export function createLeaderElection(options: LeaderElectionOptions): LeaderElection {
  const { lockName, locks, logger } = options;
  const status$ = new BehaviorSubject<ElectionStatus>('idle');
  const abortController = new AbortController();

  let releaseHold: (() => void) | null = null;
  const held = new Promise<void>((resolve) => {
    releaseHold = resolve;
  });

  function holdLock(): Promise<void> {
    if (status$.value === 'closed') return Promise.resolve();

    status$.next('leader');
    logger.info('Lock granted', { lockName });
    options.onElected();
    return held;
  }

  function attemptLeadership(): void {
    if (status$.value !== 'idle') return;

    status$.next('waiting');
    logger.debug('Requesting lock', { lockName });

    locks.request(lockName, holdLock, { signal: abortController.signal }).catch((error: unknown) => {
      if (isAbortError(error) || status$.value === 'closed') {
        logger.debug('Lock request abandoned', { lockName });
        return;
      }

      const failure = new LockAcquisitionError(
        errorMessage(error),
        { lockName },
        error instanceof Error ? error : undefined
      );
      status$.next('failed');
      logger.warn('Lock request failed, staying follower', { lockName }, failure);
      options.onLockFailed?.(failure);
    });
  }

  function release(): void {
    if (status$.value === 'closed') return;

    const wasLeader = status$.value === 'leader';
    status$.next('closed');
    if (wasLeader) {
      releaseHold?.();
    } else {
      abortController.abort();
    }
    status$.complete();
  }

  return {
    attemptLeadership,
    release,
    getStatus: () => status$.value,
    status$: status$.asObservable(),
  };
}
