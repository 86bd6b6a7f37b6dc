export interface CatalogUser {
  id: number;
  name: string;
  email: string;
  age: number;
}

export interface CatalogPost {
  id: number;
  title: string;
  content: string;
}

export interface CatalogComment {
  id: number;
  postId: number;
  content: string;
  author: string;
}

export interface CatalogSeed {
  users: CatalogUser[];
  posts: CatalogPost[];
  comments: CatalogComment[];
}

/**
 * Next id for an append: one past the highest id in use, 1 for an empty list.
 */
export function nextId(records: readonly { id: number }[]): number {
  return records.reduce((max, record) => Math.max(max, record.id), 0) + 1;
}
