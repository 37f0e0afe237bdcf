import pg from 'pg';
import type { Env } from '../config/env.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

export function createPool(env: Pick<Env, 'DATABASE_URL'>): DbPool {
  return new Pool({
    connectionString: env.DATABASE_URL,
  });
}

/**
 * Test connection on startup. A bot without its database has nothing to serve,
 * so callers exit on rejection.
 */
export async function checkConnection(pool: DbPool): Promise<void> {
  await pool.query('SELECT NOW()');
  console.log('[db] Connected to PostgreSQL');
}
