import type { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { toActor, type Actor } from '../../../domain/auth/user.js';
import { UserRepo } from '../../db/userRepo.js';
import { asyncHandler } from './asyncHandler.js';
import { setFlash } from './flash.js';

declare global {
  namespace Express {
    interface Request {
      /** The signed-in user, or null for anonymous requests. */
      actor?: Actor | null;
    }
  }
}

export const SESSION_COOKIE = 'session';
const SESSION_TTL_SECONDS = 7 * 24 * 60 * 60;

export interface SessionOptions {
  secret: string;
  secure: boolean;
}

const sessionClaimsSchema = z.object({
  userId: z.number().int().positive(),
});

export function currentActor(req: Request): Actor | null {
  return req.actor ?? null;
}

export function verifySessionToken(token: string, secret: string): number | null {
  try {
    const claims = sessionClaimsSchema.safeParse(jwt.verify(token, secret));
    return claims.success ? claims.data.userId : null;
  } catch {
    // Expired, tampered or signed with another secret
    return null;
  }
}

export function issueSession(res: Response, actor: Actor, options: SessionOptions): void {
  const token = jwt.sign({ userId: actor.id }, options.secret, {
    expiresIn: SESSION_TTL_SECONDS,
  });
  res.cookie(SESSION_COOKIE, token, {
    httpOnly: true,
    sameSite: 'lax',
    secure: options.secure,
    maxAge: SESSION_TTL_SECONDS * 1000,
  });
}

export function clearSession(res: Response, options: SessionOptions): void {
  res.clearCookie(SESSION_COOKIE, {
    httpOnly: true,
    sameSite: 'lax',
    secure: options.secure,
  });
}

/**
 * Resolve the session cookie to the current user on every request.
 * A cookie that no longer maps to a user is dropped.
 */
export function sessionMiddleware(userRepo: UserRepo, options: SessionOptions) {
  return asyncHandler(async (req, res, next) => {
    req.actor = null;

    const token: unknown = req.cookies[SESSION_COOKIE];
    if (typeof token === 'string') {
      const userId = verifySessionToken(token, options.secret);
      const user = userId === null ? null : await userRepo.findById(userId);
      if (user) {
        req.actor = toActor(user);
      } else {
        clearSession(res, options);
      }
    }

    res.locals.currentUser = req.actor;
    next();
  });
}

export function requireLogin(req: Request, res: Response, next: NextFunction): void {
  if (currentActor(req)) {
    next();
    return;
  }
  setFlash(res, 'Please log in to access this page.');
  res.redirect('/login');
}
