/**
 * @module @sqlite-relay/storage-sqlite
 * Storage collaborator backed by sql.js (SQLite compiled to WebAssembly).
 */

import * as sqlJs from 'sql.js';
import type { Database, QueryExecResult, SqlJsStatic, SqlValue } from 'sql.js';
import {
  DatabaseInitializationError,
  QueryExecutionError,
  errorMessage,
} from '@sqlite-relay/core';
import type { DatabaseHandle, StorageInitializer } from '@sqlite-relay/core';
import type { EncodedRow, EncodedValue, SqlJsStorageConfig } from './types.js';

function encodeValue(value: SqlValue | undefined): EncodedValue {
  if (value instanceof Uint8Array) return Array.from(value);
  return value ?? null;
}

/**
 * Encode the last result set of an `exec` call as a JSON array of row
 * objects. Statements that return no rows encode as `[]`.
 */
export function encodeResultSet(results: QueryExecResult[]): string {
  const last = results[results.length - 1];
  if (!last) return '[]';

  const rows = last.values.map((values) => {
    const row: EncodedRow = {};
    last.columns.forEach((column, index) => {
      row[column] = encodeValue(values[index]);
    });
    return row;
  });
  return JSON.stringify(rows);
}

/**
 * Open database handle. Executes raw SQL and returns encoded results.
 */
export class SqlJsDatabaseHandle implements DatabaseHandle {
  private open = true;

  constructor(private readonly db: Database) {}

  async execute(sql: string): Promise<string> {
    if (!this.open) {
      throw new QueryExecutionError('Database is closed');
    }

    let results: QueryExecResult[];
    try {
      results = this.db.exec(sql);
    } catch (error) {
      throw new QueryExecutionError(errorMessage(error), { sql }, error instanceof Error ? error : undefined);
    }
    return encodeResultSet(results);
  }

  /** Serialize the database to a SQLite file image */
  export(): Uint8Array {
    return this.db.export();
  }

  isOpen(): boolean {
    return this.open;
  }

  close(): void {
    if (!this.open) return;
    this.open = false;
    this.db.close();
  }
}

/**
 * Loads sql.js and opens an in-memory database. Each `initialize()` call
 * opens a fresh database.
 */
export class SqlJsStorage implements StorageInitializer<SqlJsDatabaseHandle> {
  constructor(private readonly config: SqlJsStorageConfig = {}) {}

  /**
   * @throws {DatabaseInitializationError} If sql.js cannot be loaded or the
   * image cannot be opened
   */
  async initialize(): Promise<SqlJsDatabaseHandle> {
    let SQL: SqlJsStatic;
    try {
      SQL = await (this.config.sqlJsFactory ?? (() => sqlJs.default()))();
    } catch (error) {
      throw new DatabaseInitializationError(
        `Failed to load sql.js WASM module: ${errorMessage(error)}`,
        { operation: 'load' },
        error instanceof Error ? error : undefined
      );
    }

    let db: Database;
    try {
      db = new SQL.Database(this.config.data ?? null);
      this.applyPragmas(db);
    } catch (error) {
      throw new DatabaseInitializationError(
        errorMessage(error),
        { operation: 'open' },
        error instanceof Error ? error : undefined
      );
    }

    return new SqlJsDatabaseHandle(db);
  }

  private applyPragmas(db: Database): void {
    if (this.config.foreignKeys) {
      db.run('PRAGMA foreign_keys = ON');
    }
    if (this.config.journalMode) {
      db.run(`PRAGMA journal_mode = ${this.config.journalMode}`);
    }
    if (this.config.cacheSize !== undefined) {
      // Negative values are KB rather than pages
      db.run(`PRAGMA cache_size = -${Math.abs(Math.trunc(this.config.cacheSize))}`);
    }
  }
}

/**
 * Create a sql.js storage initializer.
 *
 * @example
 * ```typescript
 * const coordinator = createWorkerCoordinator({
 *   storage: createSqlJsStorage({ foreignKeys: true }),
 * });
 * ```
 */
export function createSqlJsStorage(config?: SqlJsStorageConfig): SqlJsStorage {
  return new SqlJsStorage(config);
}
