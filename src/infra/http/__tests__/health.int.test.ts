import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import request from 'supertest';
import { pingDatabase, pool } from '../../db/pool.js';
import { buildTestApp } from '../../../__tests__/helpers/testApp.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('GET /healthz against PostgreSQL', () => {
  beforeAll(async () => {
    await pool.query('SELECT 1');
  });

  afterAll(async () => {
    await pool.end();
  });

  it('returns 200 when DB is reachable', async () => {
    const { app } = buildTestApp({ healthCheck: pingDatabase });

    const res = await request(app).get('/healthz');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });
});
