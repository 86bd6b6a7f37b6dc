import { Router } from 'express';
import { z } from 'zod';
import { UserRepository } from '../../../domain/auth/user.js';
import { PostRepository } from '../../../domain/posts/post.js';
import { CreatePostUseCase } from '../../../application/posts/createPost.js';
import { UpdatePostUseCase } from '../../../application/posts/updatePost.js';
import { DeletePostUseCase } from '../../../application/posts/deletePost.js';
import { PostQueries } from '../../../application/posts/queries.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { idParamsSchema } from './schemas.js';

/**
 * @openapi
 * /api/posts:
 *   get:
 *     tags: [Posts]
 *     summary: List posts
 *     responses:
 *       200: { description: "{ data: Post[] }" }
 *
 * /api/posts/{id}:
 *   get:
 *     tags: [Posts]
 *     summary: Show a post
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: "{ data: Post }" }
 *       404:
 *         description: Post not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/posts/create:
 *   post:
 *     tags: [Posts]
 *     summary: Create a post
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title, content, userId]
 *             properties:
 *               title: { type: string }
 *               content: { type: string }
 *               userId: { type: integer }
 *     responses:
 *       201: { description: "{ message, data: Post }" }
 *       404:
 *         description: Author not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/posts/update/{id}:
 *   put:
 *     tags: [Posts]
 *     summary: Replace a post's title, content and author
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title, content, userId]
 *             properties:
 *               title: { type: string }
 *               content: { type: string }
 *               userId: { type: integer }
 *     responses:
 *       200: { description: "{ message, data: Post }" }
 *       404:
 *         description: Post or author not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/posts/delete/{id}:
 *   delete:
 *     tags: [Posts]
 *     summary: Delete a post
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: "{ message }" }
 *       404:
 *         description: Post not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const postBodySchema = z.object({
  title: z.string().trim().min(1).max(255),
  content: z.string().min(1),
  userId: z.number().int().positive(),
});

export interface PostRoutesOptions {
  postRepo: PostRepository;
  userRepo: UserRepository;
}

export function createPostRoutes({ postRepo, userRepo }: PostRoutesOptions) {
  const router = Router();
  const createPostUseCase = new CreatePostUseCase(postRepo, userRepo);
  const updatePostUseCase = new UpdatePostUseCase(postRepo, userRepo);
  const deletePostUseCase = new DeletePostUseCase(postRepo);
  const queries = new PostQueries(postRepo);

  router.get(
    '/posts',
    asyncHandler(async (_req, res) => {
      res.json({ data: await queries.getPosts() });
    })
  );

  router.get(
    '/posts/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json({ data: await queries.getPost(id) });
    })
  );

  router.post(
    '/posts/create',
    validate({ body: postBodySchema }),
    asyncHandler(async (req, res) => {
      const body = postBodySchema.parse(req.body);
      const post = await createPostUseCase.execute(body);
      res.status(201).json({ message: 'Post Successfully Created!', data: post });
    })
  );

  router.put(
    '/posts/update/:id',
    validate({ params: idParamsSchema, body: postBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = postBodySchema.parse(req.body);
      const post = await updatePostUseCase.execute({ id, ...body });
      res.json({ message: 'Post Updated Successfully', data: post });
    })
  );

  router.delete(
    '/posts/delete/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await deletePostUseCase.execute(id);
      res.json({ message: 'Post Deleted Successfully' });
    })
  );

  return router;
}
