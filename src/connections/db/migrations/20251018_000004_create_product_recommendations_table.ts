import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS product_recommendations (
        id SERIAL PRIMARY KEY,
        base_product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        recommended_product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        CONSTRAINT uq_recommendation UNIQUE (base_product_id, recommended_product_id),
        CONSTRAINT ck_recommendation_not_self CHECK (base_product_id <> recommended_product_id)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_product_recommendations_target ON product_recommendations(recommended_product_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_product_recommendations_target');
    await client.query('DROP TABLE IF EXISTS product_recommendations CASCADE');
  },
};
