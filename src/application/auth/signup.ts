import { PublicUser, toPublicUser } from '../../domain/auth/user.js';
import { CreateUserCommand, CreateUserUseCase } from '../users/createUser.js';
import { SessionTokens, claimsFor } from './sessionToken.js';

export type SignupCommand = CreateUserCommand;

export interface SignupResult {
  token: string;
  user: PublicUser;
}

/**
 * Creates the account and opens a session for it straight away, so the
 * new role and age are available to the gates without a separate login.
 */
export class SignupUseCase {
  constructor(
    private createUser: CreateUserUseCase,
    private tokens: SessionTokens
  ) {}

  async execute(command: SignupCommand): Promise<SignupResult> {
    const user = await this.createUser.execute(command);
    return {
      token: this.tokens.issue(claimsFor(user)),
      user: toPublicUser(user),
    };
  }
}
