import { describe, it, expect } from 'vitest';
import type { Actor } from '../../auth/user.js';
import { canEditCafe, isSuperAdmin } from '../policy.js';

const SUPER_ADMIN_ID = 1;
const alice: Actor = { id: 1, email: 'a@x.com', name: 'Alice' };
const bob: Actor = { id: 2, email: 'b@x.com', name: 'Bob' };
const carol: Actor = { id: 3, email: 'c@x.com', name: 'Carol' };

describe('isSuperAdmin', () => {
  it('should accept the bootstrap user', () => {
    expect(isSuperAdmin(alice, SUPER_ADMIN_ID)).toBe(true);
  });

  it('should reject every other user', () => {
    expect(isSuperAdmin(bob, SUPER_ADMIN_ID)).toBe(false);
  });

  it('should reject anonymous requests', () => {
    expect(isSuperAdmin(null, SUPER_ADMIN_ID)).toBe(false);
  });

  it('should follow the configured id', () => {
    expect(isSuperAdmin(bob, 2)).toBe(true);
    expect(isSuperAdmin(alice, 2)).toBe(false);
  });
});

describe('canEditCafe', () => {
  const bobsCafe = { contributorId: bob.id };

  it('should let the contributor edit', () => {
    expect(canEditCafe(bob, bobsCafe, SUPER_ADMIN_ID)).toBe(true);
  });

  it('should let the super-admin edit any cafe', () => {
    expect(canEditCafe(alice, bobsCafe, SUPER_ADMIN_ID)).toBe(true);
  });

  it('should deny other users', () => {
    expect(canEditCafe(carol, bobsCafe, SUPER_ADMIN_ID)).toBe(false);
  });

  it('should deny anonymous requests', () => {
    expect(canEditCafe(null, bobsCafe, SUPER_ADMIN_ID)).toBe(false);
  });
});
