import { Router } from 'express';
import { z } from 'zod';
import { StaticDataService } from '../../../application/catalog/staticDataService.js';
import { NotFoundError } from '../../../application/errors.js';
import { UnderageError } from '../../../domain/access/errors.js';
import { parseAge } from '../../../domain/access/policy.js';
import { claimedAge, verifyAge } from '../middleware/access.js';
import { validate } from '../middleware/validate.js';
import { idParamsSchema } from './schemas.js';

/**
 * @openapi
 * /catalog/users:
 *   get:
 *     tags: [Catalog]
 *     summary: List the in-memory users
 *     responses:
 *       200: { description: "CatalogUser[]" }
 *   post:
 *     tags: [Catalog]
 *     summary: Add a user (age verified)
 *     description: The age is read from the body, then the `age` query parameter, then the `X-Age` header, and must be at least 21 by default.
 *     parameters:
 *       - in: header
 *         name: X-Age
 *         schema: { type: integer }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, email]
 *             properties:
 *               name: { type: string }
 *               email: { type: string, format: email }
 *               age: { type: integer }
 *     responses:
 *       201: { description: CatalogUser }
 *       403:
 *         description: Age missing or too low (UNDERAGE)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /catalog/users/{id}:
 *   get:
 *     tags: [Catalog]
 *     summary: Show an in-memory user
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200: { description: CatalogUser }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Catalog]
 *     summary: Merge fields into an in-memory user
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200: { description: CatalogUser }
 *
 * /catalog/posts:
 *   get:
 *     tags: [Catalog]
 *     summary: List the in-memory posts
 *     responses:
 *       200: { description: "CatalogPost[]" }
 *
 * /catalog/posts/{id}:
 *   get:
 *     tags: [Catalog]
 *     summary: Show an in-memory post
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200: { description: CatalogPost }
 *       404: { description: Post not found }
 *   delete:
 *     tags: [Catalog]
 *     summary: Delete a post and its comments
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       204: { description: Deleted }
 *       404: { description: Post not found }
 *
 * /catalog/posts/{id}/comments:
 *   get:
 *     tags: [Catalog]
 *     summary: Comments on a post
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200: { description: "CatalogComment[]" }
 *
 * /catalog/comments:
 *   get:
 *     tags: [Catalog]
 *     summary: List all comments
 *     responses:
 *       200: { description: "CatalogComment[]" }
 *   post:
 *     tags: [Catalog]
 *     summary: Comment on an existing post
 *     responses:
 *       201: { description: CatalogComment }
 *       404: { description: Post not found }
 *
 * /catalog/comments/{id}:
 *   get:
 *     tags: [Catalog]
 *     summary: Show a comment
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200: { description: CatalogComment }
 *       404: { description: Comment not found }
 *   patch:
 *     tags: [Catalog]
 *     summary: Edit a comment
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200: { description: CatalogComment }
 *       404: { description: Comment not found }
 *   delete:
 *     tags: [Catalog]
 *     summary: Delete a comment
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       204: { description: Deleted }
 *       404: { description: Comment not found }
 */

const addUserBodySchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().email(),
  // Fractions are cut the same way verifyAge reads them
  age: z.coerce.number().nonnegative().transform(Math.trunc).optional(),
});

const updateUserBodySchema = addUserBodySchema.partial();

const addCommentBodySchema = z.object({
  postId: z.number().int().positive(),
  content: z.string().trim().min(1),
  author: z.string().trim().min(1),
});

const updateCommentBodySchema = addCommentBodySchema.omit({ postId: true }).partial();

export interface CatalogRoutesOptions {
  catalog: StaticDataService;
  minVerifiedAge?: number;
}

export function createCatalogRoutes({ catalog, minVerifiedAge = 21 }: CatalogRoutesOptions) {
  const router = Router();

  router.get('/users', (_req, res) => {
    res.json(catalog.getUsers());
  });

  router.get('/users/:id', validate({ params: idParamsSchema }), (req, res) => {
    const { id } = idParamsSchema.parse(req.params);
    const user = catalog.getUserById(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    res.json(user);
  });

  router.post(
    '/users',
    verifyAge(minVerifiedAge),
    validate({ body: addUserBodySchema }),
    (req, res) => {
      const body = addUserBodySchema.parse(req.body);
      // The verified age may have come from the query or X-Age instead
      const age = body.age ?? parseAge(claimedAge(req));
      if (age === null) {
        throw new UnderageError({ minimumAge: minVerifiedAge, providedAge: null });
      }
      res.status(201).json(catalog.addUser({ ...body, age }));
    }
  );

  router.patch(
    '/users/:id',
    validate({ params: idParamsSchema, body: updateUserBodySchema }),
    (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const user = catalog.updateUser(id, updateUserBodySchema.parse(req.body));
      if (!user) {
        throw new NotFoundError('User not found');
      }
      res.json(user);
    }
  );

  router.get('/posts', (_req, res) => {
    res.json(catalog.getPosts());
  });

  router.get('/posts/:id', validate({ params: idParamsSchema }), (req, res) => {
    const { id } = idParamsSchema.parse(req.params);
    const post = catalog.getPostById(id);
    if (!post) {
      throw new NotFoundError('Post not found');
    }
    res.json(post);
  });

  router.delete('/posts/:id', validate({ params: idParamsSchema }), (req, res) => {
    const { id } = idParamsSchema.parse(req.params);
    if (!catalog.deletePost(id)) {
      throw new NotFoundError('Post not found');
    }
    res.status(204).end();
  });

  router.get('/posts/:id/comments', validate({ params: idParamsSchema }), (req, res) => {
    const { id } = idParamsSchema.parse(req.params);
    res.json(catalog.getCommentsByPostId(id));
  });

  router.get('/comments', (_req, res) => {
    res.json(catalog.getComments());
  });

  router.get('/comments/:id', validate({ params: idParamsSchema }), (req, res) => {
    const { id } = idParamsSchema.parse(req.params);
    const comment = catalog.getCommentById(id);
    if (!comment) {
      throw new NotFoundError('Comment not found');
    }
    res.json(comment);
  });

  router.post('/comments', validate({ body: addCommentBodySchema }), (req, res) => {
    const body = addCommentBodySchema.parse(req.body);
    if (!catalog.getPostById(body.postId)) {
      throw new NotFoundError('Post not found');
    }
    res.status(201).json(catalog.addComment(body));
  });

  router.patch(
    '/comments/:id',
    validate({ params: idParamsSchema, body: updateCommentBodySchema }),
    (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const comment = catalog.updateComment(id, updateCommentBodySchema.parse(req.body));
      if (!comment) {
        throw new NotFoundError('Comment not found');
      }
      res.json(comment);
    }
  );

  router.delete('/comments/:id', validate({ params: idParamsSchema }), (req, res) => {
    const { id } = idParamsSchema.parse(req.params);
    if (!catalog.deleteComment(id)) {
      throw new NotFoundError('Comment not found');
    }
    res.status(204).end();
  });

  return router;
}
