import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  AgeMissingError,
  RoleMissingError,
  RoleNotAllowedError,
  UnderageError,
} from '../../../domain/access/errors.js';
import { ConflictError, NotFoundError, UnauthorizedError } from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

/** Postgres unique_violation, e.g. two signups racing for one email. */
function isUniqueViolation(err: Error): boolean {
  return 'code' in err && err.code === '23505';
}

/** body-parser's error for a request body that is not valid JSON. */
function isMalformedBody(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function mapError(err: Error): MappedError | null {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      },
    };
  }

  if (isMalformedBody(err)) {
    return { status: 400, body: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' } };
  }

  // Access gates
  if (err instanceof AgeMissingError) {
    return { status: 401, body: { code: 'AGE_MISSING', message: err.message } };
  }

  if (err instanceof UnderageError) {
    return {
      status: 403,
      body: { code: 'UNDERAGE', message: err.message, details: { ...err.details } },
    };
  }

  if (err instanceof RoleMissingError) {
    return { status: 401, body: { code: 'ROLE_MISSING', message: err.message } };
  }

  if (err instanceof RoleNotAllowedError) {
    return {
      status: 401,
      body: {
        code: 'ROLE_NOT_ALLOWED',
        message: err.message,
        details: { allowedRoles: err.allowedRoles, actualRole: err.actualRole },
      },
    };
  }

  // Application-level errors
  if (err instanceof UnauthorizedError) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  if (err instanceof ConflictError || isUniqueViolation(err)) {
    const message = err instanceof ConflictError ? err.message : 'Resource already exists';
    return { status: 409, body: { code: 'CONFLICT', message } };
  }

  return null;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const mapped = mapError(err);
  if (mapped) {
    res.status(mapped.status).json(mapped.body);
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}

/**
 * Catch-all for requests no route matched.
 */
export function notFoundHandler(req: Request, res: Response): void {
  const response: ErrorResponse = {
    code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
  };
  res.status(404).json(response);
}
