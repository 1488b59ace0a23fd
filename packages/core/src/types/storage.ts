/**
 * Storage collaborator contracts.
 *
 * The relay never parses or runs SQL itself: the leader hands statements to
 * a {@link DatabaseHandle} obtained once from a {@link StorageInitializer}.
 */

/**
 * An open database owned by the leader context.
 *
 * Several executions may overlap on one handle; serializing them is the
 * engine's job.
 */
export interface DatabaseHandle {
  /**
   * Run SQL and resolve with the encoded result set.
   * Rejects with the engine's error text as the error message.
   */
  execute(sql: string): Promise<string>;

  /** Release the engine. Called once, when the owning coordinator closes. */
  close?(): void;
}

/**
 * Opens the persistent store. Called at most once per leader.
 */
export interface StorageInitializer<THandle extends DatabaseHandle = DatabaseHandle> {
  initialize(): Promise<THandle>;
}
