export const ROLES = ['user', 'admin'] as const;

export type Role = (typeof ROLES)[number];

export const DEFAULT_ROLE: Role = 'user';

/**
 * User entity as stored. `passwordHash` never leaves the application layer;
 * use {@link toPublicUser} before returning a user over HTTP.
 */
export interface User {
  readonly id: number;
  readonly name: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly age: number | null;
  readonly emailVerifiedAt: Date | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
  role: Role;
  age: number | null;
}

export interface UserChanges {
  name: string;
  email: string;
  /** Left untouched when omitted. */
  passwordHash?: string;
}

export interface UserRepository {
  findAll(): Promise<User[]>;
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
  update(id: number, changes: UserChanges): Promise<User | null>;
  /** Removes the user and, through the foreign key, their posts. */
  delete(id: number): Promise<boolean>;
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}
