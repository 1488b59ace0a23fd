/**
 * Relay Error System
 *
 * Every failure a caller of `executeQuery` can see is a RelayError whose
 * message is the plain text that also travels between contexts.
 *
 * @example
 * ```typescript
 * import { RelayError } from '@sqlite-relay/core';
 *
 * try {
 *   await coordinator.executeQuery(sql);
 * } catch (error) {
 *   if (RelayError.isCode(error, 'RELAY_T300')) {
 *     console.log('No leader answered');
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  CoordinatorClosedError,
  DatabaseInitializationError,
  DatabaseNotInitializedError,
  LockAcquisitionError,
  QueryExecutionError,
  QueryTimeoutError,
  RelayError,
  errorFromWireText,
  errorMessage,
  type RelayErrorOptions,
} from './relay-error.js';
