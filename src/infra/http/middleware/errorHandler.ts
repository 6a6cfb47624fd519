import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { DomainError } from '../../../domain/cafes/errors.js';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
} from '../../../application/errors.js';

/**
 * What the `error` view shows.
 */
export interface ErrorView {
  status: number;
  title: string;
  message: string;
}

export function toErrorView(err: Error): ErrorView {
  if (err instanceof ZodError || err instanceof DomainError) {
    return {
      status: 400,
      title: 'Bad Request',
      message: err instanceof DomainError ? err.message : 'The submitted data was invalid.',
    };
  }

  if (err instanceof UnauthorizedError) {
    return { status: 401, title: 'Unauthorized', message: err.message };
  }

  // No detail: the reason for a denial is not shared with the requester
  if (err instanceof ForbiddenError) {
    return {
      status: 403,
      title: 'Forbidden',
      message: 'You do not have permission to access this page.',
    };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, title: 'Not Found', message: err.message };
  }

  if (err instanceof ConflictError) {
    return { status: 409, title: 'Conflict', message: err.message };
  }

  return {
    status: 500,
    title: 'Internal Server Error',
    message: 'Something went wrong on our end.',
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  const view: ErrorView = {
    status: 404,
    title: 'Not Found',
    message: 'The page you requested does not exist.',
  };
  res.status(404).render('error', view);
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  next: NextFunction
): void {
  const view = toErrorView(err);
  if (view.status >= 500) {
    console.error('Error:', err);
  }

  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(view.status).render('error', view);
}
