import { pool } from './pool.js';
import {
  NewUser,
  Role,
  User,
  UserChanges,
  UserRepository,
} from '../../domain/auth/user.js';

// A type alias, not an interface: pg needs an implicit index signature
type UserRow = {
  id: number;
  name: string;
  email: string;
  password_hash: string;
  role: Role;
  age: number | null;
  email_verified_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

const USER_COLUMNS =
  'id, name, email, password_hash, role, age, email_verified_at, created_at, updated_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    age: row.age,
    emailVerifiedAt: row.email_verified_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgUserRepo implements UserRepository {
  async findAll(): Promise<User[]> {
    const result = await pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users ORDER BY id`);
    return result.rows.map(toUser);
  }

  async findById(id: number): Promise<User | null> {
    const result = await pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async create(user: NewUser): Promise<User> {
    const result = await pool.query<UserRow>(
      `INSERT INTO users (name, email, password_hash, role, age)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${USER_COLUMNS}`,
      [user.name, user.email, user.passwordHash, user.role, user.age]
    );
    return toUser(result.rows[0]);
  }

  async update(id: number, changes: UserChanges): Promise<User | null> {
    const result = await pool.query<UserRow>(
      `UPDATE users
       SET name = $2,
           email = $3,
           password_hash = COALESCE($4, password_hash),
           updated_at = NOW()
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [id, changes.name, changes.email, changes.passwordHash ?? null]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await pool.query('DELETE FROM users WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
