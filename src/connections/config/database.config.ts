import { PoolConfig } from 'pg';
import dotenv from 'dotenv';

dotenv.config();

const buildDbConfig = (): PoolConfig => {
  const max = parseInt(process.env.DB_POOL_MAX || '10');

  if (process.env.DATABASE_URL) {
    return { connectionString: process.env.DATABASE_URL, max };
  }

  return {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432'),
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'password',
    database: process.env.DB_NAME || 'catalog_db',
    max,
  };
};

export const dbConfig = buildDbConfig();
