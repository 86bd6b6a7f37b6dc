import { PostRepository } from '../../domain/posts/post.js';
import { NotFoundError } from '../errors.js';

export class DeletePostUseCase {
  constructor(private postRepo: PostRepository) {}

  async execute(id: number): Promise<void> {
    const deleted = await this.postRepo.delete(id);
    if (!deleted) {
      throw new NotFoundError('Post not found');
    }
  }
}
