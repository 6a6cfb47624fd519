import { Password } from '../../domain/auth/password.js';
import { toActor, type Actor } from '../../domain/auth/user.js';
import { UserRepo } from '../../infra/db/userRepo.js';
import { IncorrectPasswordError, UnknownEmailError } from '../errors.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export class LoginUseCase {
  constructor(private userRepo: UserRepo) {}

  async execute(command: LoginCommand): Promise<Actor> {
    const user = await this.userRepo.findByEmail(command.email);
    if (!user) {
      throw new UnknownEmailError();
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new IncorrectPasswordError();
    }

    return toActor(user);
  }
}
