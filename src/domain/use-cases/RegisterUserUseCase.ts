import { IUserRepository } from '../repositories/IUserRepository';
import { IPasswordHasher } from '../services/IPasswordHasher';
import { HabitTrackerError } from '../errors/HabitTrackerError';
import { Logger } from '../../infrastructure/logger/Logger';

export class RegisterUserUseCase {
  constructor(
    private userRepository: IUserRepository,
    private passwordHasher: IPasswordHasher
  ) {}

  async execute(username: string | null | undefined, password: string | null | undefined): Promise<number> {
    const trimmedUsername = (username ?? '').trim();
    if (trimmedUsername.length === 0 || !password || password.trim().length === 0) {
      throw new HabitTrackerError('InvalidInput', 'Username and password are required.');
    }

    const duplicateError = new HabitTrackerError(
      'DuplicateUsername',
      'Username already exists. Please choose a different one.'
    );

    if (await this.userRepository.findByUsername(trimmedUsername)) {
      Logger.info('Registration rejected, username taken', { username: trimmedUsername });
      throw duplicateError;
    }

    const passwordHash = await this.passwordHasher.hash(password);
    // createUser re-checks uniqueness atomically in case another signup got there first
    const user = await this.userRepository.createUser(trimmedUsername, passwordHash);
    if (!user) {
      Logger.info('Registration rejected, username taken', { username: trimmedUsername });
      throw duplicateError;
    }

    Logger.info('User registered', { userId: user.id, username: user.username });
    return user.id;
  }
}
