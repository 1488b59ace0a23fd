/**
 * Structured logging for the relay packages.
 *
 * A small structured logger with levels, JSON output, per-module prefixes
 * and a global debug switch. Silent unless a handler, JSON output or debug
 * mode is configured, so worker contexts do not spam the console.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
  readonly error?: { name: string; message: string; stack?: string };
}

/** Logger configuration */
export interface RelayLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: console when json or debug) */
  readonly handler?: (entry: LogEntry) => void;
  /** Enable JSON output format */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all relay loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'worker-coordinator', level: 'debug' });
 *
 * log.info('Leadership acquired', { workerId });
 *
 * const end = log.time('database-init');
 * await storage.initialize();
 * end();
 * ```
 */
export class RelayLogger {
  private readonly config: Required<Omit<RelayLoggerConfig, 'handler' | 'json'>> &
    Pick<RelayLoggerConfig, 'handler' | 'json'>;

  constructor(config: RelayLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'sqlite-relay',
      handler: config.handler,
      json: config.json,
    };
  }

  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): RelayLogger {
    return new RelayLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log('warn', message, context, error);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
      ...(error !== undefined ? { error: describeError(error) } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json) {
      consoleFor(level)(JSON.stringify(entry));
    } else if (this.config.debug || globalDebug) {
      consoleFor(level)(`[${entry.module}] ${message}`, context ?? '');
    }
  }
}

function describeError(error: unknown): { name: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Error', message: String(error) };
}

function consoleFor(level: LogLevel): (...args: unknown[]) => void {
  switch (level) {
    case 'error':
      return console.error;
    case 'warn':
      return console.warn;
    default:
      return console.log;
  }
}

/** Factory function to create a RelayLogger */
export function createLogger(config?: RelayLoggerConfig): RelayLogger {
  return new RelayLogger(config);
}
