import rateLimit from 'express-rate-limit';

export interface RateLimitOptions {
  /** Requests per minute per client across the whole site. */
  generalLimit?: number;
  /** Login attempts per minute per IP. */
  loginLimit?: number;
}

/**
 * Uses the in-memory store, so counters reset on restart and each app
 * instance gets its own.
 */
export function createRateLimiters({ generalLimit = 300, loginLimit = 10 }: RateLimitOptions = {}) {
  const general = rateLimit({
    windowMs: 60 * 1000,
    limit: generalLimit,
    message: 'Too many requests, please try again later.',
    standardHeaders: true,
    legacyHeaders: false,
  });

  const login = rateLimit({
    windowMs: 60 * 1000,
    limit: loginLimit,
    message: 'Too many login attempts, please try again later.',
    standardHeaders: true,
    legacyHeaders: false,
  });

  return { general, login };
}
