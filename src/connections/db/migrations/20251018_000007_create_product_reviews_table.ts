import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS product_reviews (
        id SERIAL PRIMARY KEY,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        title VARCHAR(120) NOT NULL,
        description VARCHAR(300) NOT NULL,
        author_name VARCHAR(100) NOT NULL,
        score SMALLINT NOT NULL CHECK (score BETWEEN 1 AND 5),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_product_reviews_product ON product_reviews(product_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_product_reviews_product');
    await client.query('DROP TABLE IF EXISTS product_reviews CASCADE');
  },
};
