import type { SqlJsStatic } from 'sql.js';

/**
 * sql.js storage configuration
 */
export interface SqlJsStorageConfig {
  /**
   * Optional factory for the sql.js module. Lets the host decide where the
   * WASM binary comes from.
   *
   * @example
   * ```typescript
   * import initSqlJs from 'sql.js';
   *
   * const storage = createSqlJsStorage({
   *   sqlJsFactory: () => initSqlJs({
   *     locateFile: (file) => `https://sql.js.org/dist/${file}`,
   *   }),
   * });
   * ```
   */
  sqlJsFactory?: () => Promise<SqlJsStatic>;
  /** Database image to open instead of an empty database */
  data?: Uint8Array;
  /** Enable foreign keys */
  foreignKeys?: boolean;
  /** Journal mode */
  journalMode?: 'DELETE' | 'TRUNCATE' | 'PERSIST' | 'MEMORY' | 'OFF';
  /** Cache size in KB */
  cacheSize?: number;
}

/**
 * A column value as it appears in the encoded result set. Blobs are
 * encoded as arrays of byte values.
 */
export type EncodedValue = number | string | null | number[];

/**
 * One encoded row, keyed by column name
 */
export type EncodedRow = Record<string, EncodedValue>;
