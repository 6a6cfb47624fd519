import type { Actor } from '../auth/user.js';
import type { Cafe } from './cafe.js';

/**
 * Only the bootstrap account may delete entries.
 * Anonymous requests are never super-admin.
 */
export function isSuperAdmin(actor: Actor | null, superAdminId: number): boolean {
  return actor !== null && actor.id === superAdminId;
}

/**
 * An entry may be edited by its contributor or by the super-admin.
 */
export function canEditCafe(
  actor: Actor | null,
  cafe: Pick<Cafe, 'contributorId'>,
  superAdminId: number
): boolean {
  if (actor === null) {
    return false;
  }
  return actor.id === cafe.contributorId || isSuperAdmin(actor, superAdminId);
}
