import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { ROLES, Role, User } from '../../domain/auth/user.js';
import { UnauthorizedError } from '../errors.js';

/**
 * What a request "session" knows about the caller. It travels inside the
 * bearer token, so nothing is kept server-side.
 */
export interface SessionClaims {
  userId: number;
  email: string;
  role: Role;
  age?: number;
}

const claimsSchema = z.object({
  userId: z.number().int().positive(),
  email: z.string(),
  role: z.enum(ROLES),
  age: z.number().int().nonnegative().optional(),
});

export function claimsFor(user: User): SessionClaims {
  const claims: SessionClaims = { userId: user.id, email: user.email, role: user.role };
  if (user.age !== null) {
    claims.age = user.age;
  }
  return claims;
}

export class SessionTokens {
  constructor(
    private secret: string,
    private expiresInSeconds: number
  ) {}

  issue(claims: SessionClaims): string {
    return jwt.sign({ ...claims }, this.secret, { expiresIn: this.expiresInSeconds });
  }

  /**
   * @throws UnauthorizedError when the token is invalid, expired, or
   * carries claims this service did not issue.
   */
  verify(token: string): SessionClaims {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        throw new UnauthorizedError('Invalid or expired token');
      }
      throw error;
    }

    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new UnauthorizedError('Invalid or expired token');
    }
    return parsed.data;
  }
}
