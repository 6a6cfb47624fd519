import { createHash } from 'crypto';

/**
 * Avatar shown next to each comment ("retro" placeholder for unknown addresses).
 */
export function gravatarUrl(email: string, size = 100): string {
  const hash = createHash('md5').update(email.trim().toLowerCase()).digest('hex');
  return `https://www.gravatar.com/avatar/${hash}?s=${size}&d=retro&r=g`;
}
