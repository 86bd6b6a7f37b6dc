import { Router } from 'express';
import { z } from 'zod';
import { ROLES, UserRepository, toPublicUser } from '../../../domain/auth/user.js';
import { PASSWORD_MIN_LENGTH } from '../../../domain/auth/password.js';
import { PostRepository } from '../../../domain/posts/post.js';
import { CreateUserUseCase } from '../../../application/users/createUser.js';
import { UpdateUserUseCase } from '../../../application/users/updateUser.js';
import { DeleteUserUseCase } from '../../../application/users/deleteUser.js';
import { UserQueries } from '../../../application/users/queries.js';
import { requireAuth } from '../middleware/session.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { idParamsSchema } from './schemas.js';

/**
 * @openapi
 * /api/users:
 *   get:
 *     tags: [Users]
 *     summary: List users
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: "{ data: User[] }" }
 *       401:
 *         description: Unauthenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Show a user
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: "{ data: User }" }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/{id}/posts:
 *   get:
 *     tags: [Users]
 *     summary: Posts written by a user
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: "{ data: Post[] }" }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/create:
 *   post:
 *     tags: [Users]
 *     summary: Create a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, email, password]
 *             properties:
 *               name: { type: string }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *               age: { type: integer, minimum: 0 }
 *               role: { type: string, enum: [user, admin] }
 *     responses:
 *       201: { description: "{ message, data: User }" }
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/update/{id}:
 *   put:
 *     tags: [Users]
 *     summary: Update a user (password optional)
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
 *             required: [name, email]
 *             properties:
 *               name: { type: string }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       200: { description: "{ message, data: User }" }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/delete/{id}:
 *   delete:
 *     tags: [Users]
 *     summary: Delete a user and their posts
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: "{ message }" }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const createUserBodySchema = z.object({
  name: z.string().trim().min(1).max(255),
  email: z.string().email(),
  password: z.string().min(PASSWORD_MIN_LENGTH),
  age: z.number().int().min(0).max(150).optional(),
  role: z.enum(ROLES).optional(),
});

const updateUserBodySchema = z.object({
  name: z.string().trim().min(1).max(255),
  email: z.string().email(),
  // Empty string means "keep the current password", as the edit form sends it
  password: z.union([z.literal(''), z.string().min(PASSWORD_MIN_LENGTH)]).optional(),
});

export interface UserRoutesOptions {
  userRepo: UserRepository;
  postRepo: PostRepository;
}

export function createUserRoutes({ userRepo, postRepo }: UserRoutesOptions) {
  const router = Router();
  const createUserUseCase = new CreateUserUseCase(userRepo);
  const updateUserUseCase = new UpdateUserUseCase(userRepo);
  const deleteUserUseCase = new DeleteUserUseCase(userRepo);
  const queries = new UserQueries(userRepo, postRepo);

  router.get(
    '/users',
    requireAuth,
    asyncHandler(async (_req, res) => {
      res.json({ data: await queries.getUsers() });
    })
  );

  router.get(
    '/users/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json({ data: await queries.getUser(id) });
    })
  );

  router.get(
    '/users/:id/posts',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json({ data: await queries.getPostsOf(id) });
    })
  );

  router.post(
    '/users/create',
    validate({ body: createUserBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createUserBodySchema.parse(req.body);
      const user = await createUserUseCase.execute(body);
      res.status(201).json({
        message: 'User Successfully Created!',
        data: toPublicUser(user),
      });
    })
  );

  router.put(
    '/users/update/:id',
    validate({ params: idParamsSchema, body: updateUserBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = updateUserBodySchema.parse(req.body);
      const user = await updateUserUseCase.execute({ id, ...body });
      res.json({
        message: 'User Updated Successfully',
        data: toPublicUser(user),
      });
    })
  );

  router.delete(
    '/users/delete/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await deleteUserUseCase.execute(id);
      res.json({ message: 'User Deleted Successfully' });
    })
  );

  return router;
}
