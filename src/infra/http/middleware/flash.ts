import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';

const FLASH_COOKIE = 'flash';
const messagesSchema = z.array(z.string());

function parseMessages(raw: string): string[] {
  try {
    const parsed = messagesSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

/**
 * One-shot messages carried across a redirect in a cookie.
 * Messages are exposed to views as `messages` and cleared once read.
 */
export function flash(req: Request, res: Response, next: NextFunction): void {
  const raw: unknown = req.cookies[FLASH_COOKIE];
  res.locals.messages = typeof raw === 'string' ? parseMessages(raw) : [];
  if (raw !== undefined) {
    res.clearCookie(FLASH_COOKIE);
  }
  next();
}

export function setFlash(res: Response, message: string): void {
  res.cookie(FLASH_COOKIE, JSON.stringify([message]), {
    httpOnly: true,
    sameSite: 'lax',
  });
}
