import { pathToFileURL } from 'url';
import { pool } from '../infra/db/pool.js';

export type CreateUserTableOutcome = 'created' | 'exists';

/**
 * Creates the base `users` table on its own, outside the migration history
 * (same shape as migration 001, so `npm run migrate` can take over from it).
 * An existing table is left untouched.
 */
export async function createUserTable(): Promise<CreateUserTableOutcome> {
  const existing = await pool.query<{ users_table: string | null }>(
    "SELECT to_regclass('public.users')::text AS users_table"
  );
  if (existing.rows[0]?.users_table) {
    console.warn('Users table already exists!');
    return 'exists';
  }

  await pool.query(`
    CREATE TABLE users (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      email VARCHAR(255) NOT NULL UNIQUE,
      email_verified_at TIMESTAMPTZ NULL,
      password_hash VARCHAR(255) NOT NULL,
      remember_token VARCHAR(100) NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  console.log('Users table created successfully!');
  return 'created';
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  createUserTable()
    .catch((error: unknown) => {
      console.error('Failed to create users table:', error);
      process.exitCode = 1;
    })
    .finally(() => {
      void pool.end();
    });
}
