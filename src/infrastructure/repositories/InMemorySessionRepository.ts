import { InMemoryDatabase } from './InMemoryDatabase';
import { ISessionRepository } from '../../domain/repositories/ISessionRepository';
import { Session } from '../../domain/entities/Session';
import { Clock, systemClock } from '../../domain/utils/dates';

export class InMemorySessionRepository implements ISessionRepository {
  constructor(
    private db: InMemoryDatabase,
    private clock: Clock = systemClock
  ) {}

  async get(sessionId: string): Promise<Session | null> {
    const stored = this.db.sessions.get(sessionId);
    if (!stored) {
      return null;
    }
    if (stored.expiresAt <= this.clock().getTime()) {
      this.db.sessions.delete(sessionId);
      return null;
    }
    return structuredClone(stored.session);
  }

  async save(sessionId: string, session: Session, ttlSeconds: number): Promise<void> {
    this.db.sessions.set(sessionId, {
      session: structuredClone(session),
      expiresAt: this.clock().getTime() + ttlSeconds * 1000,
    });
  }

  async destroy(sessionId: string): Promise<void> {
    this.db.sessions.delete(sessionId);
  }
}
