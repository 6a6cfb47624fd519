import { MAX_RATING, MIN_RATING } from './cafe.js';

export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidRatingError extends DomainError {
  constructor(message = `Rating must be between ${MIN_RATING} and ${MAX_RATING}.`) {
    super(message);
  }
}
