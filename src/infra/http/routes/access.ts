import { Router } from 'express';
import { requireAuth, SessionRequest } from '../middleware/session.js';
import { checkAge, checkRole } from '../middleware/access.js';
import { logRequest } from '../middleware/requestLogger.js';

/**
 * @openapi
 * /api/adult-content:
 *   get:
 *     tags: [Access]
 *     summary: Age-gated content
 *     description: Requires a session whose age is at least the adult age (18 by default).
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: "{ success }" }
 *       401:
 *         description: No age in session (AGE_MISSING)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       403:
 *         description: Too young (UNDERAGE)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/movies:
 *   get:
 *     tags: [Access]
 *     summary: Age-gated movies
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: "{ success }" }
 *
 * /api/events:
 *   get:
 *     tags: [Access]
 *     summary: Age-gated events
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: "{ success }" }
 *
 * /api/premium-content:
 *   get:
 *     tags: [Access]
 *     summary: Admin-only content
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: "{ success }" }
 *       401:
 *         description: Unauthenticated, no role in session, or role not allowed
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/dashboard:
 *   get:
 *     tags: [Access]
 *     summary: Plain-text check that the session is valid
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: "success" }
 *
 * /api/me:
 *   get:
 *     tags: [Access]
 *     summary: Current session claims
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: "{ data: SessionClaims }" }
 *
 * /api/data:
 *   get:
 *     tags: [Access]
 *     summary: Logged request echo
 *     responses:
 *       200: { description: "{ method, path, query }" }
 */

export interface AccessRoutesOptions {
  minAdultAge?: number;
}

export function createAccessRoutes({ minAdultAge = 18 }: AccessRoutesOptions = {}) {
  const router = Router();
  const adultsOnly = checkAge(minAdultAge);

  router.get('/adult-content', adultsOnly, (_req, res) => {
    res.status(200).json({ success: 'You are old enough' });
  });

  router.get('/movies', adultsOnly, (_req, res) => {
    res.status(200).json({ success: 'You are old enough to access movies' });
  });

  router.get('/events', adultsOnly, (_req, res) => {
    res.status(200).json({ success: 'You are old enough for events' });
  });

  router.get('/premium-content', requireAuth, checkRole('admin'), (_req, res) => {
    res.status(200).json({ success: 'Welcome to premium content' });
  });

  router.get('/dashboard', requireAuth, (_req, res) => {
    res.type('text/plain').send('success');
  });

  router.get('/me', requireAuth, (req: SessionRequest, res) => {
    res.json({ data: req.session });
  });

  router.get('/data', logRequest, (req, res) => {
    res.json({ method: req.method, path: req.path, query: req.query });
  });

  return router;
}
