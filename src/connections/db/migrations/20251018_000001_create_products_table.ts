import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS products (
        id SERIAL PRIMARY KEY,
        name VARCHAR(120) NOT NULL,
        price NUMERIC(10, 2) NOT NULL CHECK (price > 0),
        description TEXT NOT NULL,
        lifetime_guarantee BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
