import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { pool } from '../../infra/db/pool.js';
import { migrate } from '../../infra/db/migrate.js';
import { createUserTable } from '../createUserTable.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('table:create-user', () => {
  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await migrate();
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await pool.end();
  });

  it('leaves an existing users table alone', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await expect(createUserTable()).resolves.toBe('exists');
    expect(warn).toHaveBeenCalledWith('Users table already exists!');
  });
});
