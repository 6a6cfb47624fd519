import { Password } from '../../domain/auth/password.js';
import { toActor, type Actor } from '../../domain/auth/user.js';
import { UserRepo } from '../../infra/db/userRepo.js';
import { DuplicateEmailError } from '../errors.js';

export interface RegisterCommand {
  email: string;
  name: string;
  password: string;
}

export class RegisterUseCase {
  constructor(private userRepo: UserRepo) {}

  /**
   * @throws DuplicateEmailError when the email is already registered
   */
  async execute(command: RegisterCommand): Promise<Actor> {
    // Fast path only; the unique index decides under concurrent sign-ups
    const existing = await this.userRepo.findByEmail(command.email);
    if (existing) {
      throw new DuplicateEmailError();
    }

    const passwordHash = await Password.hash(command.password);
    const user = await this.userRepo.create(command.email, command.name, passwordHash);

    return toActor(user);
  }
}
