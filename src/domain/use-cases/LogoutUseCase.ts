import { ISessionRepository } from '../repositories/ISessionRepository';
import { Logger } from '../../infrastructure/logger/Logger';

export class LogoutUseCase {
  constructor(private sessionRepository: ISessionRepository) {}

  /**
   * Drops the identity bound to the session. Safe to call without a session
   * or for one that is already gone.
   */
  async execute(sessionId: string | null): Promise<void> {
    if (!sessionId) {
      return;
    }

    const session = await this.sessionRepository.get(sessionId);
    await this.sessionRepository.destroy(sessionId);

    if (session?.userId !== undefined) {
      Logger.info('User logged out', { userId: session.userId, username: session.username || 'unknown' });
    }
  }
}
