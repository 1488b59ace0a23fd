/**
 * RelayError - structured error information for the query relay
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a RelayError
 */
export interface RelayErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Base error for everything the relay reports.
 *
 * The `message` is the human-readable text that callers of `executeQuery`
 * see and that crosses the broadcast bus; `code` and `category` exist for
 * local handling only and are never sent to other contexts.
 *
 * @example
 * ```typescript
 * try {
 *   await coordinator.executeQuery('SELECT * FROM todos');
 * } catch (error) {
 *   if (RelayError.isCode(error, 'RELAY_T300')) {
 *     // no leader answered in time
 *   }
 * }
 * ```
 */
export class RelayError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: RelayErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'RelayError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RelayError);
    }
  }

  static isRelayError(error: unknown): error is RelayError {
    return error instanceof RelayError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return RelayError.isRelayError(error) && error.code === code;
  }
}

/**
 * The leader has no database handle (still opening, or opening failed)
 */
export class DatabaseNotInitializedError extends RelayError {
  constructor(context?: Record<string, unknown>) {
    super({ code: 'RELAY_I100', context });
    this.name = 'DatabaseNotInitializedError';
  }
}

/**
 * The storage collaborator could not open the database
 */
export class DatabaseInitializationError extends RelayError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'RELAY_I101', message, context, cause });
    this.name = 'DatabaseInitializationError';
  }
}

/**
 * The engine rejected a statement. The message is the engine's own text.
 */
export class QueryExecutionError extends RelayError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'RELAY_Q200', message, context, cause });
    this.name = 'QueryExecutionError';
  }
}

/**
 * No response arrived for a forwarded query within the timeout window
 */
export class QueryTimeoutError extends RelayError {
  constructor(context?: Record<string, unknown>) {
    super({ code: 'RELAY_T300', context });
    this.name = 'QueryTimeoutError';
  }
}

/**
 * The lock request itself failed; the context stays a follower
 */
export class LockAcquisitionError extends RelayError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'RELAY_L400', message, context, cause });
    this.name = 'LockAcquisitionError';
  }
}

/**
 * The coordinator was closed before or while the call was made
 */
export class CoordinatorClosedError extends RelayError {
  constructor(context?: Record<string, unknown>) {
    super({ code: 'RELAY_X901', context });
    this.name = 'CoordinatorClosedError';
  }
}

/**
 * Text of any thrown value, as it is sent over the bus
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Rebuild the local error class for error text received from another context.
 */
export function errorFromWireText(text: string, context?: Record<string, unknown>): RelayError {
  if (text === getErrorInfo('RELAY_I100').message) {
    return new DatabaseNotInitializedError(context);
  }
  return new QueryExecutionError(text, context);
}
