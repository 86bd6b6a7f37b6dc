import pg from 'pg';
import { loadConfig } from '../config.js';

const { Pool } = pg;

// Do not throw at import time - unit tests and scripts load this without DATABASE_URL
export const pool = new Pool({
  connectionString: loadConfig().databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('error', (err) => {
  console.error('Unexpected database error:', err);
});

/**
 * Run `work` on one client inside BEGIN/COMMIT, rolling back on failure.
 */
export async function withTransaction<T>(work: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function pingDatabase(): Promise<void> {
  await pool.query('SELECT 1');
}
