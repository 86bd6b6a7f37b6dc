export interface Post {
  readonly id: number;
  readonly userId: number;
  readonly title: string;
  readonly content: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface PostFields {
  userId: number;
  title: string;
  content: string;
}

export interface PostRepository {
  findAll(): Promise<Post[]>;
  findById(id: number): Promise<Post | null>;
  findByUserId(userId: number): Promise<Post[]>;
  create(fields: PostFields): Promise<Post>;
  update(id: number, fields: PostFields): Promise<Post | null>;
  delete(id: number): Promise<boolean>;
}
