import { UserRepository } from '../../domain/auth/user.js';
import { NotFoundError } from '../errors.js';

export class DeleteUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(id: number): Promise<void> {
    const deleted = await this.userRepo.delete(id);
    if (!deleted) {
      throw new NotFoundError('User not found');
    }
  }
}
