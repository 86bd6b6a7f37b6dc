import { Request, Response, NextFunction } from 'express';
import { SessionClaims, SessionTokens } from '../../../application/auth/sessionToken.js';
import { UnauthorizedError } from '../../../application/errors.js';

export interface SessionRequest extends Request {
  session?: SessionClaims;
}

/**
 * Opens the caller's session from a `Bearer` token when one is sent.
 * No header leaves the request anonymous; a bad header or token is a 401.
 */
export function sessionMiddleware(tokens: SessionTokens) {
  return (req: SessionRequest, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      next();
      return;
    }

    if (!authHeader.startsWith('Bearer ')) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    try {
      req.session = tokens.verify(authHeader.substring(7));
    } catch (error) {
      next(error);
      return;
    }
    next();
  };
}

export function requireAuth(req: SessionRequest, _res: Response, next: NextFunction): void {
  if (!req.session) {
    next(new UnauthorizedError('Unauthenticated'));
    return;
  }
  next();
}
