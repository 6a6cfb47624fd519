/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ForbiddenError extends Error {
  constructor(message = 'Forbidden') {
    super(message);
    this.name = 'ForbiddenError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateEmailError extends ConflictError {
  constructor(message = "You've already signed up with that email, log in instead!") {
    super(message);
    this.name = 'DuplicateEmailError';
  }
}

export class DuplicateCafeNameError extends ConflictError {
  constructor(message = 'A cafe with that name already exists.') {
    super(message);
    this.name = 'DuplicateCafeNameError';
  }
}

export class UnknownEmailError extends UnauthorizedError {
  constructor(message = 'That email does not exist, please try again.') {
    super(message);
    this.name = 'UnknownEmailError';
  }
}

export class IncorrectPasswordError extends UnauthorizedError {
  constructor(message = 'Password incorrect, please try again.') {
    super(message);
    this.name = 'IncorrectPasswordError';
  }
}
