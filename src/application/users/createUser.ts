import { Password } from '../../domain/auth/password.js';
import {
  DEFAULT_ROLE,
  Role,
  User,
  UserRepository,
} from '../../domain/auth/user.js';
import { ConflictError } from '../errors.js';

export interface CreateUserCommand {
  name: string;
  email: string;
  password: string;
  role?: Role;
  age?: number;
}

export class CreateUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: CreateUserCommand): Promise<User> {
    const existing = await this.userRepo.findByEmail(command.email);
    if (existing) {
      throw new ConflictError('User with this email already exists');
    }

    const passwordHash = await Password.hash(command.password);

    return this.userRepo.create({
      name: command.name,
      email: command.email,
      passwordHash,
      role: command.role ?? DEFAULT_ROLE,
      age: command.age ?? null,
    });
  }
}
