// Database
export {
  type DatabaseConfig,
  type DatabaseAdapter,
  type QueryResult,
  type TransactionExecutor,
} from './database.js';

// PGlite Adapter
export { PGliteDatabaseAdapter, type PGliteConfig } from './pglite-adapter.js';
