import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryDatabase } from '../../../__tests__/helpers/inMemoryDatabase.js';
import { Password } from '../../../domain/auth/password.js';
import { ConflictError, NotFoundError } from '../../errors.js';
import { CreateUserUseCase } from '../createUser.js';
import { DeleteUserUseCase } from '../deleteUser.js';
import { UserQueries } from '../queries.js';
import { UpdateUserUseCase } from '../updateUser.js';

describe('user use cases', () => {
  let db: InMemoryDatabase;
  let createUser: CreateUserUseCase;
  let updateUser: UpdateUserUseCase;
  let deleteUser: DeleteUserUseCase;
  let queries: UserQueries;

  beforeEach(async () => {
    db = new InMemoryDatabase();
    createUser = new CreateUserUseCase(db.users);
    updateUser = new UpdateUserUseCase(db.users);
    deleteUser = new DeleteUserUseCase(db.users);
    queries = new UserQueries(db.users, db.posts);

    await createUser.execute({ name: 'Ann', email: 'ann@example.com', password: 'password123', age: 22 });
    await createUser.execute({ name: 'Ben', email: 'ben@example.com', password: 'password123', role: 'admin' });
  });

  describe('CreateUserUseCase', () => {
    it('fills in the default role and a null age', async () => {
      const user = await createUser.execute({
        name: 'Cal',
        email: 'cal@example.com',
        password: 'password123',
      });

      expect(user).toMatchObject({ id: 3, role: 'user', age: null, emailVerifiedAt: null });
    });

    it('rejects an email that is already registered', async () => {
      await expect(
        createUser.execute({ name: 'Ann 2', email: 'ann@example.com', password: 'password123' })
      ).rejects.toThrow(new ConflictError('User with this email already exists'));
    });
  });

  describe('UpdateUserUseCase', () => {
    it('keeps the current password when none is given', async () => {
      const before = await db.users.findById(1);

      const updated = await updateUser.execute({ id: 1, name: 'Annie', email: 'annie@example.com' });

      expect(updated.name).toBe('Annie');
      expect(updated.email).toBe('annie@example.com');
      expect(updated.passwordHash).toBe(before?.passwordHash);
    });

    it('keeps the current password when an empty one is given', async () => {
      const before = await db.users.findById(1);

      const updated = await updateUser.execute({
        id: 1,
        name: 'Ann',
        email: 'ann@example.com',
        password: '',
      });

      expect(updated.passwordHash).toBe(before?.passwordHash);
    });

    it('rehashes a new password', async () => {
      const updated = await updateUser.execute({
        id: 1,
        name: 'Ann',
        email: 'ann@example.com',
        password: 'newpassword1',
      });

      await expect(Password.verify('newpassword1', updated.passwordHash)).resolves.toBe(true);
      await expect(Password.verify('password123', updated.passwordHash)).resolves.toBe(false);
    });

    it('rejects an email owned by another user', async () => {
      await expect(
        updateUser.execute({ id: 1, name: 'Ann', email: 'ben@example.com' })
      ).rejects.toThrow(ConflictError);
    });

    it('throws NotFoundError for a missing user', async () => {
      await expect(
        updateUser.execute({ id: 99, name: 'Nobody', email: 'nobody@example.com' })
      ).rejects.toThrow(new NotFoundError('User not found'));
    });
  });

  describe('DeleteUserUseCase', () => {
    it('removes the user and their posts', async () => {
      await db.posts.create({ userId: 1, title: 'Hello', content: 'World' });
      await db.posts.create({ userId: 2, title: 'Other', content: 'Post' });

      await deleteUser.execute(1);

      expect(await db.users.findById(1)).toBeNull();
      expect((await db.posts.findAll()).map((p) => p.userId)).toEqual([2]);
    });

    it('throws NotFoundError for a missing user', async () => {
      await expect(deleteUser.execute(99)).rejects.toThrow(NotFoundError);
    });
  });

  describe('UserQueries', () => {
    it('lists users without password hashes', async () => {
      const users = await queries.getUsers();

      expect(users.map((u) => u.email)).toEqual(['ann@example.com', 'ben@example.com']);
      for (const user of users) {
        expect(user).not.toHaveProperty('passwordHash');
      }
    });

    it('returns one user', async () => {
      await expect(queries.getUser(2)).resolves.toMatchObject({ name: 'Ben', role: 'admin' });
    });

    it('throws NotFoundError for a missing user', async () => {
      await expect(queries.getUser(42)).rejects.toThrow('User not found');
    });

    it('returns the posts a user has written', async () => {
      await db.posts.create({ userId: 2, title: 'A', content: 'a' });
      await db.posts.create({ userId: 1, title: 'B', content: 'b' });
      await db.posts.create({ userId: 2, title: 'C', content: 'c' });

      const posts = await queries.getPostsOf(2);

      expect(posts.map((p) => p.title)).toEqual(['A', 'C']);
    });

    it('returns an empty list for a user with no posts', async () => {
      await expect(queries.getPostsOf(1)).resolves.toEqual([]);
    });

    it('throws NotFoundError for the posts of a missing user', async () => {
      await expect(queries.getPostsOf(9)).rejects.toThrow(NotFoundError);
    });
  });
});
