import { Session } from '../entities/Session';

export interface ISessionRepository {
  get(sessionId: string): Promise<Session | null>;
  save(sessionId: string, session: Session, ttlSeconds: number): Promise<void>;
  destroy(sessionId: string): Promise<void>;
}
