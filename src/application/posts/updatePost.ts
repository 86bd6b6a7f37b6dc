import { UserRepository } from '../../domain/auth/user.js';
import { Post, PostFields, PostRepository } from '../../domain/posts/post.js';
import { NotFoundError } from '../errors.js';

export interface UpdatePostCommand extends PostFields {
  id: number;
}

export class UpdatePostUseCase {
  constructor(
    private postRepo: PostRepository,
    private userRepo: UserRepository
  ) {}

  async execute(command: UpdatePostCommand): Promise<Post> {
    const { id, ...fields } = command;

    const author = await this.userRepo.findById(fields.userId);
    if (!author) {
      throw new NotFoundError('User not found');
    }

    const updated = await this.postRepo.update(id, fields);
    if (!updated) {
      throw new NotFoundError('Post not found');
    }
    return updated;
  }
}
