import type {
  NewUser,
  User,
  UserChanges,
  UserRepository,
} from '../../domain/auth/user.js';
import type { Post, PostFields, PostRepository } from '../../domain/posts/post.js';

/**
 * In-process stand-in for the users and posts tables. Mirrors what the
 * schema enforces: unique emails (as a pg-style 23505 error) and posts
 * cascading away with their author.
 */
export class InMemoryDatabase {
  private userRows = new Map<number, User>();
  private postRows = new Map<number, Post>();
  private userSeq = 0;
  private postSeq = 0;

  readonly users: UserRepository = {
    findAll: async () => this.sorted(this.userRows),
    findById: async (id) => this.userRows.get(id) ?? null,
    findByEmail: async (email) =>
      [...this.userRows.values()].find((u) => u.email === email) ?? null,
    create: async (user: NewUser) => {
      this.assertEmailFree(user.email);
      const now = new Date();
      const row: User = {
        ...user,
        id: ++this.userSeq,
        emailVerifiedAt: null,
        createdAt: now,
        updatedAt: now,
      };
      this.userRows.set(row.id, row);
      return row;
    },
    update: async (id, changes: UserChanges) => {
      const current = this.userRows.get(id);
      if (!current) {
        return null;
      }
      this.assertEmailFree(changes.email, id);
      const row: User = {
        ...current,
        name: changes.name,
        email: changes.email,
        passwordHash: changes.passwordHash ?? current.passwordHash,
        updatedAt: new Date(),
      };
      this.userRows.set(id, row);
      return row;
    },
    delete: async (id) => {
      if (!this.userRows.delete(id)) {
        return false;
      }
      for (const post of [...this.postRows.values()]) {
        if (post.userId === id) {
          this.postRows.delete(post.id);
        }
      }
      return true;
    },
  };

  readonly posts: PostRepository = {
    findAll: async () => this.sorted(this.postRows),
    findById: async (id) => this.postRows.get(id) ?? null,
    findByUserId: async (userId) =>
      this.sorted(this.postRows).filter((post) => post.userId === userId),
    create: async (fields: PostFields) => {
      const now = new Date();
      const row: Post = { ...fields, id: ++this.postSeq, createdAt: now, updatedAt: now };
      this.postRows.set(row.id, row);
      return row;
    },
    update: async (id, fields: PostFields) => {
      const current = this.postRows.get(id);
      if (!current) {
        return null;
      }
      const row: Post = { ...current, ...fields, updatedAt: new Date() };
      this.postRows.set(id, row);
      return row;
    },
    delete: async (id) => this.postRows.delete(id),
  };

  private sorted<T extends { id: number }>(rows: Map<number, T>): T[] {
    return [...rows.values()].sort((a, b) => a.id - b.id);
  }

  private assertEmailFree(email: string, exceptId?: number): void {
    const taken = [...this.userRows.values()].some(
      (u) => u.email === email && u.id !== exceptId
    );
    if (taken) {
      throw Object.assign(new Error('duplicate key value violates unique constraint "users_email_key"'), {
        code: '23505',
      });
    }
  }
}
