import type { CatalogSeed } from '../../domain/catalog/records.js';

export const defaultCatalogSeed: CatalogSeed = {
  users: [
    { id: 1, name: 'John Doe', email: 'john@example.com', age: 25 },
    { id: 2, name: 'Jane Smith', email: 'jane@example.com', age: 30 },
    { id: 3, name: 'Bob Johnson', email: 'bob@example.com', age: 35 },
  ],
  posts: [
    { id: 1, title: 'First Post', content: 'Content of first post' },
    { id: 2, title: 'Second Post', content: 'Content of second post' },
  ],
  // Comment 4 points at a post that was never seeded; it is kept as-is.
  comments: [
    { id: 1, postId: 1, content: 'Great post!', author: 'Alice' },
    { id: 2, postId: 1, content: 'Thanks for sharing', author: 'Bob' },
    { id: 3, postId: 2, content: 'Very informative', author: 'Charlie' },
    { id: 4, postId: 3, content: 'Looking forward to more', author: 'Diana' },
  ],
};
