import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { pool, withTransaction } from './pool.js';

export const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

export interface Migration {
  filename: string;
  version: number;
}

const MIGRATION_FILENAME = /^(\d+)_[\w-]+\.sql$/;

/**
 * Orders `NNN_name.sql` files by their numeric prefix. Other files are ignored;
 * a `.sql` file without a prefix is an error.
 */
export function planMigrations(filenames: string[]): Migration[] {
  const versions = new Set<number>();

  return filenames
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = MIGRATION_FILENAME.exec(filename);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      const version = parseInt(match[1], 10);
      if (versions.has(version)) {
        throw new Error(`Duplicate migration version ${version}: ${filename}`);
      }
      versions.add(version);
      return { filename, version };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedVersions(): Promise<Set<number>> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return new Set(result.rows.map((row) => row.version));
}

async function applyMigration(migration: Migration, dir: string): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  await withTransaction(async (client) => {
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
  });
  console.log(`✓ Applied migration ${migration.version}: ${migration.filename}`);
}

/**
 * Applies every pending migration in `dir`. Returns the versions applied.
 */
export async function migrate(dir: string = MIGRATIONS_DIR): Promise<number[]> {
  await ensureMigrationsTable();
  const migrations = planMigrations(await readdir(dir));
  const applied = await getAppliedVersions();
  const pending = migrations.filter((m) => !applied.has(m.version));

  if (pending.length === 0) {
    console.log('No pending migrations.');
    return [];
  }

  console.log(`Found ${pending.length} pending migration(s)`);
  for (const migration of pending) {
    await applyMigration(migration, dir);
  }
  console.log('All migrations applied successfully.');
  return pending.map((m) => m.version);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  migrate()
    .catch((error: unknown) => {
      console.error('Migration failed:', error);
      process.exitCode = 1;
    })
    .finally(() => {
      void pool.end();
    });
}
