import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import type { PoolClient } from 'pg';

let pool: Pool | undefined;

export const getPool = () => {
  if (!pool) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) throw new Error('DATABASE_URL is not set');
    pool = new Pool({ connectionString });
  }
  return pool;
};

export const getDb = (client: Pool | PoolClient = getPool()) => drizzle(client);

export type DbClient = ReturnType<typeof getDb>;
