// Database
export { pool, migrate, rollback, connectDatabase, withTransaction, PgDataStore } from './db';
export type { DataStore, Repositories } from './db';

// Config - All configurations in one place
export { appConfig, paginationConfig, loggingConfig, dbConfig } from './config';
