import { randomBytes } from 'crypto';
import { ISessionRepository } from '../../domain/repositories/ISessionRepository';
import { FlashCategory, FlashMessage, Session } from '../../domain/entities/Session';
import { AuthenticatedUser } from '../../domain/entities/User';
import { parseCookies, serializeCookie, WebRequest } from './http';

export const SESSION_COOKIE = 'sid';

export function generateSessionId(): string {
  return randomBytes(24).toString('hex');
}

/**
 * Session state of one request. Changes are written back once the
 * route has produced its response.
 */
export class RequestSession {
  private dirty = false;

  constructor(
    public id: string | null,
    private data: Session
  ) {}

  get identity(): AuthenticatedUser | null {
    if (this.data.userId === undefined) {
      return null;
    }
    return { userId: this.data.userId, username: this.data.username || '' };
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get snapshot(): Session {
    return { ...this.data, flashes: [...this.data.flashes] };
  }

  flash(category: FlashCategory, message: string): void {
    this.data.flashes.push({ category, message });
    this.dirty = true;
  }

  consumeFlashes(): FlashMessage[] {
    const flashes = this.data.flashes;
    if (flashes.length > 0) {
      this.data.flashes = [];
      this.dirty = true;
    }
    return flashes;
  }

  bindIdentity(user: AuthenticatedUser): void {
    this.data.userId = user.userId;
    this.data.username = user.username;
    this.dirty = true;
  }

  // Forgets the stored session; a fresh id is issued on commit
  reset(): void {
    this.id = null;
    this.data = { flashes: [] };
    this.dirty = true;
  }
}

export class SessionManager {
  constructor(
    private sessionRepository: ISessionRepository,
    private ttlSeconds: number,
    private secureCookie: boolean,
    private generateId: () => string = generateSessionId
  ) {}

  async load(req: WebRequest): Promise<RequestSession> {
    const sessionId = parseCookies(req.headers.cookie)[SESSION_COOKIE];
    if (sessionId) {
      const stored = await this.sessionRepository.get(sessionId);
      if (stored) {
        return new RequestSession(sessionId, stored);
      }
    }
    return new RequestSession(null, { flashes: [] });
  }

  /**
   * Drops the stored session and starts a new one, so that an id handed
   * out before login is never promoted to an authenticated session.
   */
  async regenerate(session: RequestSession): Promise<void> {
    if (session.id) {
      await this.sessionRepository.destroy(session.id);
    }
    session.reset();
  }

  /**
   * Persists a changed session and returns the Set-Cookie header for it,
   * or null when nothing needs to be sent.
   */
  async commit(session: RequestSession): Promise<string | null> {
    if (!session.isDirty) {
      return null;
    }

    if (!session.id) {
      session.id = this.generateId();
    }
    await this.sessionRepository.save(session.id, session.snapshot, this.ttlSeconds);
    return serializeCookie(SESSION_COOKIE, session.id, {
      maxAgeSeconds: this.ttlSeconds,
      secure: this.secureCookie,
    });
  }
}
