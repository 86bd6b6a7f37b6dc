import { pool } from './pool.js';
import { Post, PostFields, PostRepository } from '../../domain/posts/post.js';

type PostRow = {
  id: number;
  user_id: number;
  title: string;
  content: string;
  created_at: Date;
  updated_at: Date;
};

const POST_COLUMNS = 'id, user_id, title, content, created_at, updated_at';

function toPost(row: PostRow): Post {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgPostRepo implements PostRepository {
  async findAll(): Promise<Post[]> {
    const result = await pool.query<PostRow>(`SELECT ${POST_COLUMNS} FROM posts ORDER BY id`);
    return result.rows.map(toPost);
  }

  async findById(id: number): Promise<Post | null> {
    const result = await pool.query<PostRow>(
      `SELECT ${POST_COLUMNS} FROM posts WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toPost(result.rows[0]);
  }

  async findByUserId(userId: number): Promise<Post[]> {
    const result = await pool.query<PostRow>(
      `SELECT ${POST_COLUMNS} FROM posts WHERE user_id = $1 ORDER BY id`,
      [userId]
    );
    return result.rows.map(toPost);
  }

  async create(fields: PostFields): Promise<Post> {
    const result = await pool.query<PostRow>(
      `INSERT INTO posts (user_id, title, content)
       VALUES ($1, $2, $3)
       RETURNING ${POST_COLUMNS}`,
      [fields.userId, fields.title, fields.content]
    );
    return toPost(result.rows[0]);
  }

  async update(id: number, fields: PostFields): Promise<Post | null> {
    const result = await pool.query<PostRow>(
      `UPDATE posts
       SET user_id = $2, title = $3, content = $4, updated_at = NOW()
       WHERE id = $1
       RETURNING ${POST_COLUMNS}`,
      [id, fields.userId, fields.title, fields.content]
    );
    return result.rows.length === 0 ? null : toPost(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await pool.query('DELETE FROM posts WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
