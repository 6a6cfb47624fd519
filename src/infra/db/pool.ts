import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

/**
 * Create the process-wide connection pool.
 * Nothing connects until the first query, so a bad URL surfaces on first use.
 */
export function createPool(connectionString: string): DbPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}

/**
 * Postgres reports unique index violations with SQLSTATE 23505.
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === '23505'
  );
}
