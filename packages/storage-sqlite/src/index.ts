/**
 * @sqlite-relay/storage-sqlite - sql.js storage for the query relay
 *
 * Supplies the database the elected leader opens. Results are encoded as a
 * JSON array of row objects, one object per row of the last result set.
 *
 * ```typescript
 * import { createSqlJsStorage } from '@sqlite-relay/storage-sqlite';
 *
 * const handle = await createSqlJsStorage().initialize();
 * await handle.execute('SELECT 1'); // '[{"1":1}]'
 * ```
 *
 * @packageDocumentation
 * @module @sqlite-relay/storage-sqlite
 */

export * from './sql-js-storage.js';
export type * from './types.js';
