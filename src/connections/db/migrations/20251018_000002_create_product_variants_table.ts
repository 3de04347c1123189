import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS product_variants (
        id SERIAL PRIMARY KEY,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        color VARCHAR(50) NOT NULL,
        size VARCHAR(3) NOT NULL CHECK (size IN ('XS', 'S', 'M', 'L', 'XL', 'XXL')),
        in_stock BOOLEAN NOT NULL DEFAULT FALSE,
        CONSTRAINT uq_variant UNIQUE (product_id, color, size)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_product_variants_product ON product_variants(product_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_product_variants_product');
    await client.query('DROP TABLE IF EXISTS product_variants CASCADE');
  },
};
