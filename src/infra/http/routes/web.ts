import { Router } from 'express';
import { z } from 'zod';
import { requireAuth, SessionRequest } from '../middleware/session.js';
import { checkRole } from '../middleware/access.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /:
 *   get:
 *     tags: [Web]
 *     summary: Plain-text greeting
 *     responses:
 *       200: { description: Greeting }
 *
 * /welcome:
 *   get:
 *     tags: [Web]
 *     summary: Plain-text welcome
 *     responses:
 *       200: { description: Welcome text }
 *
 * /submit-form:
 *   post:
 *     tags: [Web]
 *     summary: Validate and echo a contact form
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, message]
 *             properties:
 *               name: { type: string }
 *               email: { type: string, format: email }
 *               message: { type: string }
 *     responses:
 *       201: { description: "{ message, data }" }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin-panel:
 *   get:
 *     tags: [Web]
 *     summary: Admin landing page data
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: "{ message, user }" }
 *       401:
 *         description: Unauthenticated or not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const submitFormBodySchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().email().optional(),
  message: z.string().trim().min(1).max(2000),
});

export function createWebRoutes() {
  const router = Router();

  router.get('/', (_req, res) => {
    res.type('text/plain').send('Welcome to the Learning Lab API');
  });

  router.get('/welcome', (_req, res) => {
    res.type('text/plain').send('Basic route for welcome...');
  });

  router.post('/submit-form', validate({ body: submitFormBodySchema }), (req, res) => {
    const body = submitFormBodySchema.parse(req.body);
    res.status(201).json({ message: 'Form submitted', data: body });
  });

  router.get('/admin-panel', requireAuth, checkRole('admin'), (req: SessionRequest, res) => {
    res.json({ message: 'Welcome to the admin panel', user: req.session?.email });
  });

  return router;
}
