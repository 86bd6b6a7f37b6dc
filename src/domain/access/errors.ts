import type { Role } from '../auth/user.js';

export class AccessDeniedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AgeMissingError extends AccessDeniedError {
  constructor(message = 'Age not found in session') {
    super(message);
  }
}

export interface UnderageDetails {
  minimumAge: number;
  /** Whatever the caller sent, or null when nothing was sent. */
  providedAge: number | string | null;
  yearsRemaining?: number;
}

export class UnderageError extends AccessDeniedError {
  constructor(
    readonly details: UnderageDetails,
    message = `Your age should be at least ${details.minimumAge} or above.`
  ) {
    super(message);
  }
}

export class RoleMissingError extends AccessDeniedError {
  constructor(message = 'Role not found in session') {
    super(message);
  }
}

export class RoleNotAllowedError extends AccessDeniedError {
  constructor(
    readonly allowedRoles: readonly Role[],
    readonly actualRole: Role
  ) {
    super(`Users cannot access this route only ${allowedRoles.join(', ')}.`);
  }
}
