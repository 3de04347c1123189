import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS cart_items (
        id SERIAL PRIMARY KEY,
        cart_id INTEGER NOT NULL REFERENCES carts(id) ON DELETE CASCADE,
        variant_id INTEGER NOT NULL REFERENCES product_variants(id) ON DELETE CASCADE,
        quantity INTEGER NOT NULL DEFAULT 1 CHECK (quantity > 0),
        CONSTRAINT uq_cart_item UNIQUE (cart_id, variant_id)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_cart_items_variant ON cart_items(variant_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_cart_items_variant');
    await client.query('DROP TABLE IF EXISTS cart_items CASCADE');
  },
};
