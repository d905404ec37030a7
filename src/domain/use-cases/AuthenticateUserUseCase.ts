import { IUserRepository } from '../repositories/IUserRepository';
import { IPasswordHasher } from '../services/IPasswordHasher';
import { AuthenticatedUser } from '../entities/User';
import { HabitTrackerError } from '../errors/HabitTrackerError';
import { Logger } from '../../infrastructure/logger/Logger';

export class AuthenticateUserUseCase {
  constructor(
    private userRepository: IUserRepository,
    private passwordHasher: IPasswordHasher
  ) {}

  async execute(username: string | null | undefined, password: string | null | undefined): Promise<AuthenticatedUser> {
    const trimmedUsername = (username ?? '').trim();
    const user = trimmedUsername ? await this.userRepository.findByUsername(trimmedUsername) : null;

    if (!user || !password || !(await this.passwordHasher.verify(password, user.passwordHash))) {
      Logger.warn('Login failed', { username: trimmedUsername || 'unknown' });
      throw new HabitTrackerError('InvalidCredentials', 'Invalid username or password.');
    }

    Logger.info('User logged in', { userId: user.id, username: user.username });
    return { userId: user.id, username: user.username };
  }
}
