import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { dbConfig } from '../config/database.config';
import { logger } from '../../utils/logging';

export const pool = new Pool(dbConfig);

pool.on('error', (err: Error) => {
  logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  process.exit(-1);
});

/**
 * Minimal query surface shared by the pool and a checked-out client,
 * so repositories run the same SQL inside or outside a transaction.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export const fromPool = (source: Pool): Queryable => ({
  query: <R extends QueryResultRow>(text: string, values?: unknown[]) => source.query<R>(text, values),
});

export const fromClient = (client: PoolClient): Queryable => ({
  query: <R extends QueryResultRow>(text: string, values?: unknown[]) => client.query<R>(text, values),
});

/**
 * The part of a checked-out client a transaction needs.
 */
export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(err?: Error | boolean): void;
}

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Run `work` between BEGIN and COMMIT on an already checked-out client, then release it.
 * A client whose ROLLBACK failed is released as broken so the pool discards it.
 */
export const runTransaction = async <C extends TransactionClient, T>(
  client: C,
  work: (client: C) => Promise<T>
): Promise<T> => {
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    client.release();
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Transaction rollback failed', {
        error: errorMessage(rollbackError),
        cause: errorMessage(error),
      });
      client.release(rollbackError instanceof Error ? rollbackError : true);
      throw error;
    }
    client.release();
    throw error;
  }
};

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client, rolling back on any error.
 */
export const withTransaction = async <T>(
  work: (client: PoolClient) => Promise<T>,
  source: Pool = pool
): Promise<T> => runTransaction(await source.connect(), work);

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (maxRetries: number = 10, retryDelay: number = 2000): Promise<void> => {
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err) {
      lastError = err;
      if (attempt < maxRetries) {
        logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, { error: errorMessage(err) });
        await new Promise(resolve => setTimeout(resolve, retryDelay));
      } else {
        logger.error(`Database connection error after ${maxRetries} attempts:`, { error: errorMessage(err) });
      }
    }
  }

  throw lastError;
};
