import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import type { ErrorResponse } from './errorHandler.js';

function limiter(limit: number, message: string): RateLimitRequestHandler {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    // In-memory store, per IP; resets on restart
    handler: (_req, res, _next, options) => {
      const body: ErrorResponse = { code: 'RATE_LIMITED', message };
      res.status(options.statusCode).json(body);
    },
  });
}

/**
 * General API rate limiter (requests per minute per IP).
 */
export function createApiRateLimiter(limit = 60): RateLimitRequestHandler {
  return limiter(limit, 'Too many requests, please try again later.');
}

/**
 * Stricter rate limiter for the login endpoint.
 */
export function createLoginRateLimiter(limit = 10): RateLimitRequestHandler {
  return limiter(limit, 'Too many login attempts, please try again later.');
}
