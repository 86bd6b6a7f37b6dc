import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { buildTestApp } from '../../../__tests__/helpers/testApp.js';

describe('API docs', () => {
  it('serves the OpenAPI document built from the route comments', async () => {
    const { app } = buildTestApp({ docs: true });

    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(200);
    expect(response.body.openapi).toBe('3.0.0');
    expect(response.body.info.title).toBe('Learning Lab API');
    expect(Object.keys(response.body.paths)).toContain('/api/adult-content');
  });

  it('is not mounted when turned off', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(404);
  });
});
