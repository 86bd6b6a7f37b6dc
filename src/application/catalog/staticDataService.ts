import {
  CatalogComment,
  CatalogPost,
  CatalogSeed,
  CatalogUser,
  nextId,
} from '../../domain/catalog/records.js';
import { defaultCatalogSeed } from './seed.js';

export type NewCatalogUser = Omit<CatalogUser, 'id'>;
export type NewCatalogComment = Omit<CatalogComment, 'id'>;

/**
 * In-memory users, posts and comments. One instance lives for the whole
 * application; every record handed out is a copy.
 */
export class StaticDataService {
  private users: CatalogUser[];
  private posts: CatalogPost[];
  private comments: CatalogComment[];

  constructor(seed: CatalogSeed = defaultCatalogSeed) {
    this.users = seed.users.map((user) => ({ ...user }));
    this.posts = seed.posts.map((post) => ({ ...post }));
    this.comments = seed.comments.map((comment) => ({ ...comment }));
  }

  getUsers(): CatalogUser[] {
    return this.users.map((user) => ({ ...user }));
  }

  getUserById(id: number): CatalogUser | null {
    const user = this.users.find((u) => u.id === id);
    return user ? { ...user } : null;
  }

  addUser(data: NewCatalogUser): CatalogUser {
    const user: CatalogUser = { ...data, id: nextId(this.users) };
    this.users.push(user);
    return { ...user };
  }

  updateUser(id: number, patch: Partial<NewCatalogUser>): CatalogUser | null {
    const index = this.users.findIndex((u) => u.id === id);
    if (index === -1) {
      return null;
    }
    const updated: CatalogUser = { ...this.users[index], ...patch, id };
    this.users[index] = updated;
    return { ...updated };
  }

  getPosts(): CatalogPost[] {
    return this.posts.map((post) => ({ ...post }));
  }

  getPostById(id: number): CatalogPost | null {
    const post = this.posts.find((p) => p.id === id);
    return post ? { ...post } : null;
  }

  /**
   * Removes the post together with its comments. Returns false, and leaves
   * every comment in place, when no post had that id.
   */
  deletePost(id: number): boolean {
    const before = this.posts.length;
    this.posts = this.posts.filter((post) => post.id !== id);
    if (this.posts.length === before) {
      return false;
    }
    this.comments = this.comments.filter((comment) => comment.postId !== id);
    return true;
  }

  getComments(): CatalogComment[] {
    return this.comments.map((comment) => ({ ...comment }));
  }

  getCommentById(id: number): CatalogComment | null {
    const comment = this.comments.find((c) => c.id === id);
    return comment ? { ...comment } : null;
  }

  getCommentsByPostId(postId: number): CatalogComment[] {
    return this.comments
      .filter((comment) => comment.postId === postId)
      .map((comment) => ({ ...comment }));
  }

  addComment(data: NewCatalogComment): CatalogComment {
    const comment: CatalogComment = { ...data, id: nextId(this.comments) };
    this.comments.push(comment);
    return { ...comment };
  }

  updateComment(id: number, patch: Partial<NewCatalogComment>): CatalogComment | null {
    const index = this.comments.findIndex((c) => c.id === id);
    if (index === -1) {
      return null;
    }
    const updated: CatalogComment = { ...this.comments[index], ...patch, id };
    this.comments[index] = updated;
    return { ...updated };
  }

  deleteComment(id: number): boolean {
    const before = this.comments.length;
    this.comments = this.comments.filter((comment) => comment.id !== id);
    return this.comments.length !== before;
  }
}
