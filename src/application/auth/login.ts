import { Password } from '../../domain/auth/password.js';
import { PublicUser, UserRepository, toPublicUser } from '../../domain/auth/user.js';
import { UnauthorizedError } from '../errors.js';
import { SessionTokens, claimsFor } from './sessionToken.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  token: string;
  user: PublicUser;
}

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: SessionTokens
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.userRepo.findByEmail(command.email);
    if (!user) {
      throw new UnauthorizedError('Invalid email or password');
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError('Invalid email or password');
    }

    // Hashes made under older cost settings are upgraded on the next login
    if (Password.needsRehash(user.passwordHash)) {
      await this.userRepo.update(user.id, {
        name: user.name,
        email: user.email,
        passwordHash: await Password.hash(command.password),
      });
    }

    return {
      token: this.tokens.issue(claimsFor(user)),
      user: toPublicUser(user),
    };
  }
}
