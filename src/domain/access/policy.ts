import type { Role } from '../auth/user.js';

export type AgeDecision =
  | { allowed: true }
  | { allowed: false; yearsRemaining: number };

const NUMERIC_AGE = /^\d+(\.\d+)?$/;

/**
 * Reads an age from untrusted input. Fractions are truncated toward zero;
 * anything that is not a non-negative number yields null.
 */
export function parseAge(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw >= 0 ? Math.trunc(raw) : null;
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    return NUMERIC_AGE.test(trimmed) ? Math.trunc(Number(trimmed)) : null;
  }
  return null;
}

export function evaluateAge(age: number, minimumAge: number): AgeDecision {
  if (age >= minimumAge) {
    return { allowed: true };
  }
  return { allowed: false, yearsRemaining: minimumAge - age };
}

export function hasRole(role: Role, allowedRoles: readonly Role[]): boolean {
  return allowedRoles.includes(role);
}
