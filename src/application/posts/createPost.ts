import { UserRepository } from '../../domain/auth/user.js';
import { Post, PostFields, PostRepository } from '../../domain/posts/post.js';
import { NotFoundError } from '../errors.js';

export type CreatePostCommand = PostFields;

export class CreatePostUseCase {
  constructor(
    private postRepo: PostRepository,
    private userRepo: UserRepository
  ) {}

  async execute(command: CreatePostCommand): Promise<Post> {
    const author = await this.userRepo.findById(command.userId);
    if (!author) {
      throw new NotFoundError('User not found');
    }
    return this.postRepo.create(command);
  }
}
