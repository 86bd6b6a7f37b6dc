import { Response, NextFunction } from 'express';
import type { Role } from '../../../domain/auth/user.js';
import {
  AgeMissingError,
  RoleMissingError,
  RoleNotAllowedError,
  UnderageError,
} from '../../../domain/access/errors.js';
import { evaluateAge, hasRole, parseAge } from '../../../domain/access/policy.js';
import type { SessionRequest } from './session.js';

/**
 * Lets the request through when the session's age is at least `minimumAge`.
 */
export function checkAge(minimumAge = 18) {
  return (req: SessionRequest, _res: Response, next: NextFunction): void => {
    const age = req.session?.age;
    if (age === undefined) {
      next(new AgeMissingError());
      return;
    }

    const decision = evaluateAge(age, minimumAge);
    if (!decision.allowed) {
      next(
        new UnderageError(
          { minimumAge, providedAge: age, yearsRemaining: decision.yearsRemaining },
          `Too Young, come after ${decision.yearsRemaining} years`
        )
      );
      return;
    }
    next();
  };
}

/**
 * Lets the request through when the session's role is one of `allowedRoles`
 * (admin when none are given).
 */
export function checkRole(...allowedRoles: Role[]) {
  const roles: readonly Role[] = allowedRoles.length > 0 ? allowedRoles : ['admin'];

  return (req: SessionRequest, _res: Response, next: NextFunction): void => {
    const role = req.session?.role;
    if (role === undefined) {
      next(new RoleMissingError());
      return;
    }
    if (!hasRole(role, roles)) {
      next(new RoleNotAllowedError(roles, role));
      return;
    }
    next();
  };
}

type RawAge = number | string | null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asRawAge(value: unknown): RawAge {
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return null;
}

/**
 * The age the caller claims: body `age`, then query `age`, then `X-Age`.
 */
export function claimedAge(req: SessionRequest): RawAge {
  const fromBody = isRecord(req.body) ? asRawAge(req.body.age) : null;
  if (fromBody !== null) {
    return fromBody;
  }
  const fromQuery = asRawAge(req.query.age);
  if (fromQuery !== null) {
    return fromQuery;
  }
  return req.get('X-Age') ?? null;
}

/**
 * Age gate on what the caller sends rather than on the session.
 */
export function verifyAge(minimumAge = 21) {
  return (req: SessionRequest, _res: Response, next: NextFunction): void => {
    const provided = claimedAge(req);
    const age = parseAge(provided);
    if (age === null || !evaluateAge(age, minimumAge).allowed) {
      next(new UnderageError({ minimumAge, providedAge: provided }));
      return;
    }
    next();
  };
}
