import { Post, PostRepository } from '../../domain/posts/post.js';
import { NotFoundError } from '../errors.js';

export class PostQueries {
  constructor(private postRepo: PostRepository) {}

  async getPosts(): Promise<Post[]> {
    return this.postRepo.findAll();
  }

  async getPost(id: number): Promise<Post> {
    const post = await this.postRepo.findById(id);
    if (!post) {
      throw new NotFoundError('Post not found');
    }
    return post;
  }
}
