import { Password } from '../../domain/auth/password.js';
import { User, UserRepository } from '../../domain/auth/user.js';
import { ConflictError, NotFoundError } from '../errors.js';

export interface UpdateUserCommand {
  id: number;
  name: string;
  email: string;
  /** Omitted or empty keeps the current password. */
  password?: string;
}

export class UpdateUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: UpdateUserCommand): Promise<User> {
    const current = await this.userRepo.findById(command.id);
    if (!current) {
      throw new NotFoundError('User not found');
    }

    if (command.email !== current.email) {
      const owner = await this.userRepo.findByEmail(command.email);
      if (owner && owner.id !== current.id) {
        throw new ConflictError('User with this email already exists');
      }
    }

    const passwordHash = command.password
      ? await Password.hash(command.password)
      : undefined;

    const updated = await this.userRepo.update(command.id, {
      name: command.name,
      email: command.email,
      passwordHash,
    });
    if (!updated) {
      throw new NotFoundError('User not found');
    }
    return updated;
  }
}
