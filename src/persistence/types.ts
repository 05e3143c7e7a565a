// pattern: Functional Core

export type QueryFunction = <T extends Record<string, unknown>>(
  sql: string,
  params?: ReadonlyArray<unknown>,
) => Promise<Array<T>>;

export type PersistenceProvider = {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  runMigrations(): Promise<void>;
  query: QueryFunction;
  /**
   * Everything `fn` runs through its query function commits or rolls back together.
   */
  withTransaction<T>(
    fn: (query: QueryFunction) => Promise<T>,
  ): Promise<T>;
};
