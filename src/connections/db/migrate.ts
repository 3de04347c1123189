import { Pool } from 'pg';
import { pool, withTransaction } from './connection';
import { migrations } from './migrations';
import { Migration, MigrationInfo } from './migrations/types';
import { logger } from '../../utils/logging';

const createMigrationsTable = async (source: Pool) => {
  await source.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (source: Pool, name: string): Promise<boolean> => {
  const result = await source.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

const runMigration = async (source: Pool, name: string, migration: Migration) => {
  await withTransaction(async client => {
    await migration.up(client);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
  }, source);
  logger.info(`Migration ${name} executed successfully`);
};

const rollbackMigration = async (source: Pool, name: string, migration: Migration) => {
  await withTransaction(async client => {
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
  }, source);
  logger.info(`Migration ${name} rolled back successfully`);
};

/**
 * Run all pending migrations in order. Returns the names that were executed.
 */
export const migrate = async (
  source: Pool = pool,
  list: MigrationInfo[] = migrations
): Promise<string[]> => {
  logger.info('Starting database migrations...');
  await createMigrationsTable(source);
  logger.info(`Found ${list.length} migration files`);

  const executed: string[] = [];
  for (const { name, migration } of list) {
    if (await isMigrationExecuted(source, name)) {
      logger.debug(`Migration ${name} already executed, skipping`);
      continue;
    }

    await runMigration(source, name, migration);
    executed.push(name);
  }

  logger.info('All migrations completed successfully');
  return executed;
};

/**
 * Roll back the most recently executed migration. Returns its name, or null when none ran.
 */
export const rollback = async (
  source: Pool = pool,
  list: MigrationInfo[] = migrations
): Promise<string | null> => {
  await createMigrationsTable(source);

  const result = await source.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to rollback');
    return null;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = list.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await rollbackMigration(source, lastMigrationName, migrationInfo.migration);
  return lastMigrationName;
};

// Run if called directly
if (require.main === module) {
  const command = process.argv[2];
  const task = command === 'rollback' ? rollback() : migrate();

  task
    .then(() => pool.end())
    .catch(async (error: unknown) => {
      logger.error('Migration error', { error: error instanceof Error ? error.message : String(error) });
      await pool.end();
      process.exit(1);
    });
}
