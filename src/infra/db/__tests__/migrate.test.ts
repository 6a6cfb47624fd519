import { describe, it, expect } from 'vitest';
import { runMigrations } from '../migrate.js';
import { UserRepo } from '../userRepo.js';
import { createMemoryPool } from './memoryPool.js';

describe('runMigrations', () => {
  it('should skip versions already applied', async () => {
    const pool = await createMemoryPool();

    expect(await runMigrations(pool)).toEqual([]);
  });

  it('should reapply the schema over existing tables without losing rows', async () => {
    const pool = await createMemoryPool();
    await new UserRepo(pool).create('a@x.com', 'Alice', 'hash');
    await pool.query('DELETE FROM schema_migrations');

    expect(await runMigrations(pool)).toEqual([1]);

    const user = await new UserRepo(pool).findByEmail('a@x.com');
    expect(user?.name).toBe('Alice');
  });
});
