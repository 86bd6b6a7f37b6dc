import { PublicUser, UserRepository, toPublicUser } from '../../domain/auth/user.js';
import { Post, PostRepository } from '../../domain/posts/post.js';
import { NotFoundError } from '../errors.js';

export class UserQueries {
  constructor(
    private userRepo: UserRepository,
    private postRepo: PostRepository
  ) {}

  async getUsers(): Promise<PublicUser[]> {
    const users = await this.userRepo.findAll();
    return users.map(toPublicUser);
  }

  async getUser(id: number): Promise<PublicUser> {
    const user = await this.userRepo.findById(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toPublicUser(user);
  }

  async getPostsOf(userId: number): Promise<Post[]> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return this.postRepo.findByUserId(userId);
  }
}
