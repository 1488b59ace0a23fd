/**
 * Relay Error Codes
 *
 * Error codes are structured as RELAY_[CATEGORY][NUMBER]:
 * - I: Initialization errors (I100-I199)
 * - Q: Query execution errors (Q200-Q299)
 * - T: Timeout errors (T300-T399)
 * - L: Lock errors (L400-L499)
 * - X: Lifecycle errors (X900-X999)
 *
 * The default messages of I100 and T300 are protocol text: they travel
 * between contexts and must not change.
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Initialization errors (I100-I199)
  RELAY_I100: {
    code: 'RELAY_I100',
    message: 'Database not initialized',
    suggestion:
      'The leader has not opened its database yet, or opening it failed. Check the leader logs for an initialization error.',
  },
  RELAY_I101: {
    code: 'RELAY_I101',
    message: 'Database initialization failed',
    suggestion: 'Ensure the SQLite engine can be loaded in this context.',
  },

  // Query errors (Q200-Q299)
  RELAY_Q200: {
    code: 'RELAY_Q200',
    message: 'Query execution failed',
    suggestion: 'Check the SQL statement against the database schema.',
  },

  // Timeout errors (T300-T399)
  RELAY_T300: {
    code: 'RELAY_T300',
    message: 'Query timeout',
    suggestion:
      'No leader answered in time. The leader may have exited, or no context holds the database lock yet.',
  },

  // Lock errors (L400-L499)
  RELAY_L400: {
    code: 'RELAY_L400',
    message: 'Lock request failed',
    suggestion: 'This context stays a follower. Check that the lock service is available.',
  },

  // Lifecycle errors (X900-X999)
  RELAY_X901: {
    code: 'RELAY_X901',
    message: 'Coordinator closed',
    suggestion: 'Create a new coordinator; a closed one does not accept queries.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'initialization' | 'query' | 'timeout' | 'lock' | 'lifecycle';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(6);
  switch (letter) {
    case 'I':
      return 'initialization';
    case 'Q':
      return 'query';
    case 'T':
      return 'timeout';
    case 'L':
      return 'lock';
    default:
      return 'lifecycle';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
