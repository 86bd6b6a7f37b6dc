/**
 * Errors raised by use cases and queries. The HTTP layer maps each class to
 * a status and code in `mapError`.
 */
export abstract class ApplicationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A user, post or comment that does not exist. */
export class NotFoundError extends ApplicationError {
  constructor(message = 'Resource not found') {
    super(message);
  }
}

/** No session, a bad token, or wrong credentials. */
export class UnauthorizedError extends ApplicationError {
  constructor(message = 'Unauthenticated') {
    super(message);
  }
}

/** A unique value, such as an email, that is already taken. */
export class ConflictError extends ApplicationError {
  constructor(message = 'Resource already exists') {
    super(message);
  }
}
