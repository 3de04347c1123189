export { pool, connectDatabase, withTransaction, fromPool, fromClient } from './connection';
export type { Queryable } from './connection';
export { migrate, rollback } from './migrate';
export { PgDataStore } from './repositories/pg-data-store';
export type { DataStore, Repositories } from './repositories/types';
