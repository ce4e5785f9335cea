import { PGlite, type Results } from '@electric-sql/pglite';
import type { DatabaseAdapter, DatabaseConfig, QueryResult, TransactionExecutor } from './database.js';
import { getLogger, type Logger } from '../observability/logger.js';

// ============================================================================
// PGlite Configuration
// ============================================================================

export interface PGliteConfig extends Partial<DatabaseConfig> {
  /** Data directory; the database lives in memory when omitted */
  dataDir?: string;
  logger?: Logger;
}

function isSelect(sql: string): boolean {
  return /^\s*(SELECT|WITH)\b/i.test(sql);
}

function toQueryResult<T>(sql: string, result: Results<T>, start: number): QueryResult<T> {
  return {
    rows: result.rows,
    rowCount: isSelect(sql) ? result.rows.length : (result.affectedRows ?? 0),
    duration: Date.now() - start,
  };
}

// ============================================================================
// PGlite Database Adapter
// ============================================================================

/**
 * Embedded Postgres (WASM) adapter. PGlite serves one connection, so queries
 * and transactions on an adapter run one at a time.
 */
export class PGliteDatabaseAdapter implements DatabaseAdapter {
  private db: PGlite | null = null;
  private readonly dataDir?: string;
  private readonly logging: boolean;
  private readonly logger: Logger;
  private queryCount = 0;
  private errorCount = 0;

  constructor(config: PGliteConfig = {}) {
    this.dataDir = config.dataDir ?? config.connectionString;
    this.logging = config.logging ?? false;
    this.logger = config.logger ?? getLogger().child({ module: 'PGliteAdapter' });
  }

  async connect(): Promise<void> {
    if (this.db) {
      return;
    }

    try {
      const db = new PGlite(this.dataDir);
      await db.waitReady;
      this.db = db;
      this.logger.info({ dataDir: this.dataDir ?? 'memory' }, 'PGlite database connected');
    } catch (error) {
      this.errorCount++;
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ error: message }, 'Failed to open PGlite database');
      throw new Error(`PGlite connection failed: ${message}`);
    }
  }

  async disconnect(): Promise<void> {
    if (!this.db) {
      return;
    }

    const db = this.db;
    this.db = null;
    await db.close();

    this.logger.info('PGlite database disconnected');
  }

  async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    const db = this.requireConnection();
    return this.run(sql, () => db.query<T>(sql, params));
  }

  async execute(sql: string): Promise<void> {
    const db = this.requireConnection();

    try {
      await db.exec(sql);
    } catch (error) {
      this.errorCount++;
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`PGlite execute failed: ${message}`);
    }
  }

  async transaction<T>(fn: (tx: TransactionExecutor) => Promise<T>): Promise<T> {
    const db = this.requireConnection();

    try {
      return await db.transaction(tx =>
        fn({
          query: <R = Record<string, unknown>>(sql: string, params: unknown[] = []) =>
            this.run(sql, () => tx.query<R>(sql, params)),
        })
      );
    } catch (error) {
      this.errorCount++;
      throw error;
    }
  }

  isConnected(): boolean {
    return this.db !== null && !this.db.closed;
  }

  getStats(): { connections: number; queries: number; errors: number } {
    return {
      connections: this.db ? 1 : 0,
      queries: this.queryCount,
      errors: this.errorCount,
    };
  }

  private async run<T>(sql: string, exec: () => Promise<Results<T>>): Promise<QueryResult<T>> {
    this.queryCount++;
    const start = Date.now();

    if (this.logging) {
      this.logger.debug({ sql }, 'PGlite query');
    }

    try {
      return toQueryResult(sql, await exec(), start);
    } catch (error) {
      this.errorCount++;
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ sql, error: message }, 'PGlite query failed');
      throw new Error(`PGlite query failed: ${message}`);
    }
  }

  private requireConnection(): PGlite {
    if (!this.db) {
      throw new Error('Database not connected');
    }
    return this.db;
  }
}
