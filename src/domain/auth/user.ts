/**
 * User domain entity.
 * Created at registration and never mutated afterwards.
 */
export interface User {
  readonly id: number;
  readonly email: string;
  readonly name: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

/**
 * The authenticated user acting on a request.
 * Resolved once per request from the session cookie.
 */
export type Actor = Pick<User, 'id' | 'email' | 'name'>;

export function toActor(user: User): Actor {
  return { id: user.id, email: user.email, name: user.name };
}
