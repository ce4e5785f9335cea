// ============================================================================
// Database Abstraction Layer
// ============================================================================

/**
 * Database connection configuration
 */
export interface DatabaseConfig {
  /** Database type */
  type: 'pglite';
  /** Connection string (for pglite: data directory; in-memory when absent) */
  connectionString?: string;
  /** Enable query logging */
  logging?: boolean;
  /** Connection timeout in milliseconds */
  connectionTimeout?: number;
}

/**
 * Query result
 */
export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
  duration: number;
}

/**
 * Query runner bound to an open transaction
 */
export interface TransactionExecutor {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Database adapter interface
 */
export interface DatabaseAdapter {
  /** Connect to the database */
  connect(): Promise<void>;
  /** Disconnect from the database */
  disconnect(): Promise<void>;
  /** Execute a parameterized query */
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
  /** Execute raw SQL (schema, multiple statements) */
  execute(sql: string): Promise<void>;
  /**
   * Run `fn` inside one transaction. No other query on the adapter runs until
   * it settles; a rejection rolls back.
   */
  transaction<T>(fn: (tx: TransactionExecutor) => Promise<T>): Promise<T>;
  /** Check if connected */
  isConnected(): boolean;
  /** Get connection stats */
  getStats(): { connections: number; queries: number; errors: number };
}
