/**
 * @module @sqlite-relay/worker-coordinator
 * Per-context coordinator: one leader owns the database, every other
 * context forwards its queries to it over the broadcast bus.
 */

import { BehaviorSubject, Subject, type Observable } from 'rxjs';
import {
  CoordinatorClosedError,
  DatabaseNotInitializedError,
  QueryExecutionError,
  RelayError,
  createLogger,
  errorMessage,
} from '@sqlite-relay/core';
import type { DatabaseHandle, RelayLogger, StorageInitializer } from '@sqlite-relay/core';
import { createBroadcastAdapter } from './broadcast-adapter.js';
import { createLeaderElection, type LeaderElection } from './leader-election.js';
import { createLockProvider } from './lock-provider.js';
import { createMessageRouter, type MessageRouter } from './message-router.js';
import {
  createLeaderAnnouncement,
  createQueryRequest,
  createQueryResponse,
  type ChannelMessage,
  type LeaderAnnouncement,
  type QueryOutcome,
  type QueryRequest,
  type QueryResponse,
} from './messages.js';
import { PendingRequestTable } from './pending-requests.js';
import type {
  BroadcastAdapter,
  CoordinatorConfig,
  CoordinatorEvent,
  CoordinatorEventType,
  CoordinatorState,
  CoordinatorStats,
  LockProvider,
} from './types.js';

type ResolvedConfig = Required<
  Pick<CoordinatorConfig, 'channelName' | 'lockName' | 'queryTimeoutMs' | 'debug'>
>;

/**
 * Default configuration. The channel and lock names are protocol constants:
 * every participating context must use the same bytes.
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  channelName: 'sqlite-queries',
  lockName: 'sqlite-database',
  queryTimeoutMs: 5000,
  debug: false,
};

function defaultGenerateId(): string {
  return crypto.randomUUID();
}

/**
 * WorkerCoordinator — single entry point for running SQL from any context.
 *
 * Every context starts as a follower and queues once for the database lock.
 * The context that gets it becomes leader for the rest of its life, opens
 * the database and announces itself. `executeQuery` runs locally on the
 * leader and is forwarded, then awaited, everywhere else.
 *
 * @example
 * ```typescript
 * const coordinator = createWorkerCoordinator({
 *   storage: createSqlJsStorage(),
 * });
 * coordinator.start();
 *
 * const rows = await coordinator.executeQuery('SELECT 1');
 * // '[{"1":1}]'
 * ```
 */
export class WorkerCoordinator {
  readonly workerId: string;

  private readonly config: ResolvedConfig;
  private readonly storage: StorageInitializer;
  private readonly transport: BroadcastAdapter;
  private readonly locks: LockProvider;
  private readonly logger: RelayLogger;
  private readonly generateId: () => string;
  private readonly election: LeaderElection;
  private readonly pending: PendingRequestTable;
  private readonly state$: BehaviorSubject<CoordinatorState>;
  private readonly events$ = new Subject<CoordinatorEvent>();

  private leader = false;
  private database: DatabaseHandle | null = null;
  private router: MessageRouter | null = null;
  private started = false;
  private closed = false;

  private executedLocally = 0;
  private forwarded = 0;
  private served = 0;
  private timedOut = 0;
  private droppedMessages = 0;

  constructor(config: CoordinatorConfig) {
    this.config = {
      channelName: config.channelName ?? DEFAULT_CONFIG.channelName,
      lockName: config.lockName ?? DEFAULT_CONFIG.lockName,
      queryTimeoutMs: config.queryTimeoutMs ?? DEFAULT_CONFIG.queryTimeoutMs,
      debug: config.debug ?? DEFAULT_CONFIG.debug,
    };
    this.storage = config.storage;
    this.generateId = config.generateId ?? defaultGenerateId;
    this.workerId = this.generateId();
    this.logger = (
      config.logger ?? createLogger({ module: 'worker-coordinator', debug: this.config.debug })
    ).child(this.workerId.slice(0, 8));
    this.transport = config.transport ?? createBroadcastAdapter(this.config.channelName);
    this.locks = config.locks ?? createLockProvider();

    this.pending = new PendingRequestTable(this.config.queryTimeoutMs, (queryId) => {
      this.timedOut++;
      this.logger.warn('Forwarded query timed out', { queryId, timeoutMs: this.config.queryTimeoutMs });
      this.emitEvent('query-timeout', queryId);
    });

    this.election = createLeaderElection({
      lockName: this.config.lockName,
      locks: this.locks,
      logger: this.logger,
      onElected: () => this.handleElected(),
      onLockFailed: (error) => this.emitEvent('lock-failed', error.message),
    });

    this.state$ = new BehaviorSubject<CoordinatorState>(this.snapshot());
  }

  // ── Observables ──────────────────────────────────────────

  get state(): Observable<CoordinatorState> {
    return this.state$.asObservable();
  }

  get events(): Observable<CoordinatorEvent> {
    return this.events$.asObservable();
  }

  getState(): CoordinatorState {
    return this.state$.value;
  }

  isLeader(): boolean {
    return this.leader;
  }

  getStats(): CoordinatorStats {
    return {
      executedLocally: this.executedLocally,
      forwarded: this.forwarded,
      served: this.served,
      timedOut: this.timedOut,
      droppedMessages: this.droppedMessages,
      pendingRequests: this.pending.size,
    };
  }

  // ── Lifecycle ────────────────────────────────────────────

  /**
   * Install the bus listener and queue for leadership. Does not wait for
   * the election; repeated calls are ignored.
   */
  start(): void {
    if (this.started || this.closed) return;
    this.started = true;

    this.router = createMessageRouter(
      this.transport,
      {
        'query-request': (message) => this.handleQueryRequest(message),
        'query-response': (message) => this.handleQueryResponse(message),
        'new-leader': (message) => this.handleLeaderAnnouncement(message),
      },
      (data) => this.handleDroppedMessage(data)
    );

    this.election.attemptLeadership();
    this.logger.debug('Coordinator started', { channelName: this.config.channelName });
  }

  /**
   * Tear the context down as if it terminated: the lock goes to the next
   * waiter, the bus is closed and the database handle is released. Forwarded queries already waiting still
   * settle only by response or timeout.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.election.release();
    this.router?.detach();
    this.router = null;
    this.transport.close();
    this.database?.close?.();

    this.updateState();
    this.state$.complete();
    this.events$.complete();
    this.logger.debug('Coordinator closed');
  }

  // ── Query API ────────────────────────────────────────────

  /**
   * Run SQL and resolve with the encoded result set.
   *
   * Rejects with the engine's text, `Database not initialized`, or, for a
   * follower whose request goes unanswered, `Query timeout`.
   */
  async executeQuery(sql: string): Promise<string> {
    if (this.closed) {
      throw new CoordinatorClosedError({ workerId: this.workerId });
    }

    if (this.leader) {
      return this.executeLocally(sql);
    }
    return this.forwardToLeader(sql);
  }

  // ── Private ──────────────────────────────────────────────

  private async executeLocally(sql: string): Promise<string> {
    const database = this.database;
    if (!database) {
      throw new DatabaseNotInitializedError({ workerId: this.workerId });
    }

    this.executedLocally++;
    try {
      return await database.execute(sql);
    } catch (error) {
      if (RelayError.isRelayError(error)) throw error;
      throw new QueryExecutionError(errorMessage(error), {}, error instanceof Error ? error : undefined);
    }
  }

  private forwardToLeader(sql: string): Promise<string> {
    const queryId = this.generateId();
    const response = this.pending.register(queryId);

    this.forwarded++;
    this.publish(createQueryRequest(queryId, sql));
    return response;
  }

  private handleElected(): void {
    this.leader = true;
    this.updateState();
    this.emitEvent('leadership-acquired', this.workerId);
    void this.openDatabase();
  }

  private async openDatabase(): Promise<void> {
    const end = this.logger.time('database-initialize');
    try {
      const database = await this.storage.initialize();
      end();
      if (this.closed) {
        // Opened after close(): nobody will use it
        database.close?.();
        return;
      }

      this.database = database;
      this.updateState();
      this.emitEvent('database-ready', this.workerId);
      this.logger.info('Database ready, announcing leadership');
      this.publish(createLeaderAnnouncement(this.workerId));
    } catch (error) {
      end({ failed: true });
      this.logger.error('Database initialization failed', error);
      this.emitEvent('database-failed', errorMessage(error));
    }
  }

  private handleQueryRequest(request: QueryRequest): void {
    if (!this.leader) return;

    this.served++;
    void this.executeLocally(request.sql)
      .then(
        (result): QueryOutcome => ({ result }),
        (error: unknown): QueryOutcome => ({ error: errorMessage(error) })
      )
      .then((outcome) => this.publish(createQueryResponse(request.queryId, outcome)));
  }

  private handleQueryResponse(response: QueryResponse): void {
    this.pending.settle(response);
  }

  private handleLeaderAnnouncement(announcement: LeaderAnnouncement): void {
    this.logger.debug('Leader announced', { leaderId: announcement.leaderId });
    this.emitEvent('leader-announced', announcement.leaderId);
  }

  private handleDroppedMessage(data: unknown): void {
    this.droppedMessages++;
    this.logger.debug('Dropped malformed message');
    this.emitEvent('message-dropped', data);
  }

  private publish(message: ChannelMessage): void {
    if (this.closed) return;

    try {
      this.transport.postMessage(message);
    } catch (error) {
      this.logger.warn('Failed to publish message', { type: message.type }, error);
    }
  }

  private snapshot(): CoordinatorState {
    return {
      workerId: this.workerId,
      isLeader: this.leader,
      databaseReady: this.database !== null,
      closed: this.closed,
    };
  }

  private updateState(): void {
    this.state$.next(this.snapshot());
  }

  private emitEvent(type: CoordinatorEventType, data?: unknown): void {
    this.events$.next({
      type,
      data,
      timestamp: Date.now(),
    });
  }
}

/**
 * Create a WorkerCoordinator.
 */
export function createWorkerCoordinator(config: CoordinatorConfig): WorkerCoordinator {
  return new WorkerCoordinator(config);
}
