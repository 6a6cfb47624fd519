import type { DbPool } from './pool.js';
import { isUniqueViolation } from './pool.js';
import type { User } from '../../domain/auth/user.js';
import { DuplicateEmailError } from '../../application/errors.js';

interface UserRow {
  id: number;
  email: string;
  password_hash: string;
  name: string;
  created_at: Date;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class UserRepo {
  constructor(private pool: DbPool) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      'SELECT id, email, password_hash, name, created_at FROM users WHERE email = $1',
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      'SELECT id, email, password_hash, name, created_at FROM users WHERE id = $1',
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  /**
   * Insert a user. The unique index on email is the real guard against
   * two concurrent registrations with the same address.
   */
  async create(email: string, name: string, passwordHash: string): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (email, name, password_hash)
         VALUES ($1, $2, $3)
         RETURNING id, email, password_hash, name, created_at`,
        [email, name, passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError();
      }
      throw error;
    }
  }
}
