import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type express from 'express';
import { buildTestApp, bearer } from '../../../__tests__/helpers/testApp.js';
import { InMemoryDatabase } from '../../../__tests__/helpers/inMemoryDatabase.js';

const session = { userId: 1, email: 'ann@example.com', role: 'user' as const };

describe('User and post resources', () => {
  let app: express.Application;
  let db: InMemoryDatabase;

  beforeEach(async () => {
    ({ app, db } = buildTestApp());
    await request(app)
      .post('/api/users/create')
      .send({ name: 'Ann', email: 'ann@example.com', password: 'password123', age: 28 });
  });

  describe('users', () => {
    it('creates a user', async () => {
      const response = await request(app)
        .post('/api/users/create')
        .send({ name: 'Ben', email: 'ben@example.com', password: 'password123', role: 'admin' });

      expect(response.status).toBe(201);
      expect(response.body.message).toBe('User Successfully Created!');
      expect(response.body.data).toMatchObject({
        id: 2,
        name: 'Ben',
        email: 'ben@example.com',
        role: 'admin',
        age: null,
        emailVerifiedAt: null,
      });
      expect(response.body.data).not.toHaveProperty('passwordHash');
    });

    it('lists users for a signed-in caller only', async () => {
      const anonymous = await request(app).get('/api/users');
      const signedIn = await request(app).get('/api/users').set('Authorization', bearer(session));

      expect(anonymous.status).toBe(401);
      expect(signedIn.status).toBe(200);
      expect(signedIn.body.data.map((u: { email: string }) => u.email)).toEqual(['ann@example.com']);
    });

    it('shows a user', async () => {
      const response = await request(app).get('/api/users/1');

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({ id: 1, name: 'Ann', role: 'user', age: 28 });
    });

    it('answers 404 for a missing user', async () => {
      const response = await request(app).get('/api/users/5');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'User not found' });
    });

    it('updates a user and keeps the password on an empty one', async () => {
      const before = await db.users.findById(1);

      const response = await request(app)
        .put('/api/users/update/1')
        .send({ name: 'Annie', email: 'annie@example.com', password: '' });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('User Updated Successfully');
      expect(response.body.data).toMatchObject({ name: 'Annie', email: 'annie@example.com' });
      expect((await db.users.findById(1))?.passwordHash).toBe(before?.passwordHash);
    });

    it('rejects a new password that is too short', async () => {
      const response = await request(app)
        .put('/api/users/update/1')
        .send({ name: 'Ann', email: 'ann@example.com', password: 'short' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('deletes a user together with their posts', async () => {
      await db.posts.create({ userId: 1, title: 'Hello', content: 'World' });

      const response = await request(app).delete('/api/users/delete/1');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ message: 'User Deleted Successfully' });
      expect(await db.posts.findAll()).toEqual([]);
    });

    it('answers 404 when deleting a missing user', async () => {
      const response = await request(app).delete('/api/users/delete/9');

      expect(response.status).toBe(404);
    });

    it('maps a unique violation from the store to 409', async () => {
      // A store that misses the lookup, as when two signups race
      const racing = new InMemoryDatabase();
      await racing.users.create({
        name: 'Ren',
        email: 'ren@example.com',
        passwordHash: 'hash',
        role: 'user',
        age: null,
      });
      ({ app } = buildTestApp({ userRepo: { ...racing.users, findByEmail: async () => null } }));

      const response = await request(app)
        .post('/api/users/create')
        .send({ name: 'Ren 2', email: 'ren@example.com', password: 'password123' });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ code: 'CONFLICT', message: 'Resource already exists' });
    });
  });

  describe('posts', () => {
    it('creates, reads, updates and deletes a post', async () => {
      const created = await request(app)
        .post('/api/posts/create')
        .send({ title: 'Hello', content: 'World', userId: 1 });

      expect(created.status).toBe(201);
      expect(created.body.message).toBe('Post Successfully Created!');
      expect(created.body.data).toMatchObject({ id: 1, userId: 1, title: 'Hello', content: 'World' });

      const updated = await request(app)
        .put('/api/posts/update/1')
        .send({ title: 'Hi', content: 'There', userId: 1 });
      expect(updated.body).toMatchObject({
        message: 'Post Updated Successfully',
        data: { id: 1, title: 'Hi', content: 'There' },
      });

      const list = await request(app).get('/api/posts');
      expect(list.body.data).toHaveLength(1);

      const deleted = await request(app).delete('/api/posts/delete/1');
      expect(deleted.body).toEqual({ message: 'Post Deleted Successfully' });

      const missing = await request(app).get('/api/posts/1');
      expect(missing.status).toBe(404);
      expect(missing.body.message).toBe('Post not found');
    });

    it('refuses a post for a missing author', async () => {
      const response = await request(app)
        .post('/api/posts/create')
        .send({ title: 'Hello', content: 'World', userId: 42 });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('User not found');
    });

    it('answers 404 when updating a missing post', async () => {
      const response = await request(app)
        .put('/api/posts/update/9')
        .send({ title: 'Hi', content: 'There', userId: 1 });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'Post not found' });
    });

    it('answers 404 for the posts of a missing user', async () => {
      const response = await request(app).get('/api/users/9/posts');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'User not found' });
    });

    it('lists the posts of a user', async () => {
      await request(app).post('/api/posts/create').send({ title: 'One', content: 'x', userId: 1 });
      await request(app).post('/api/posts/create').send({ title: 'Two', content: 'y', userId: 1 });

      const response = await request(app).get('/api/users/1/posts');

      expect(response.status).toBe(200);
      expect(response.body.data.map((p: { title: string }) => p.title)).toEqual(['One', 'Two']);
    });

    it('rejects a post without a title', async () => {
      const response = await request(app)
        .post('/api/posts/create')
        .send({ content: 'World', userId: 1 });

      expect(response.status).toBe(400);
      expect(response.body.details.issues).toEqual([{ path: 'title', message: 'Required' }]);
    });
  });
});
