import { Router } from 'express';
import { z } from 'zod';
import { ROLES, UserRepository } from '../../../domain/auth/user.js';
import { PASSWORD_MIN_LENGTH } from '../../../domain/auth/password.js';
import { SessionTokens } from '../../../application/auth/sessionToken.js';
import { SignupUseCase } from '../../../application/auth/signup.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { CreateUserUseCase } from '../../../application/users/createUser.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/auth/signup:
 *   post:
 *     tags: [Auth]
 *     summary: Create an account and open a session
 *     description: The returned token carries the role and age checked by the access gates.
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
 *       201:
 *         description: Account created, session token issued
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a session token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       429:
 *         description: Too many login attempts
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const signupBodySchema = z.object({
  name: z.string().trim().min(1).max(255),
  email: z.string().email(),
  password: z.string().min(PASSWORD_MIN_LENGTH),
  age: z.number().int().min(0).max(150).optional(),
  role: z.enum(ROLES).optional(),
});

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export interface AuthRoutesOptions {
  userRepo: UserRepository;
  tokens: SessionTokens;
  loginRateLimit?: number;
}

export function createAuthRoutes({ userRepo, tokens, loginRateLimit }: AuthRoutesOptions) {
  const router = Router();
  const signupUseCase = new SignupUseCase(new CreateUserUseCase(userRepo), tokens);
  const loginUseCase = new LoginUseCase(userRepo, tokens);

  router.post(
    '/signup',
    validate({ body: signupBodySchema }),
    asyncHandler(async (req, res) => {
      const body = signupBodySchema.parse(req.body);
      const result = await signupUseCase.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    createLoginRateLimiter(loginRateLimit),
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  return router;
}
