import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS product_images (
        id SERIAL PRIMARY KEY,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        color VARCHAR(50),
        image_url VARCHAR(255) NOT NULL
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_product_images_product ON product_images(product_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_product_images_product');
    await client.query('DROP TABLE IF EXISTS product_images CASCADE');
  },
};
