import { z } from 'zod';
import { RedisConnection } from '../config/redis';
import { RedisKeys } from './RedisKeys';
import { ISessionRepository } from '../../domain/repositories/ISessionRepository';
import { Session } from '../../domain/entities/Session';
import { errorMessage, Logger } from '../logger/Logger';

export const sessionSchema = z.object({
  userId: z.number().int().optional(),
  username: z.string().optional(),
  flashes: z
    .array(
      z.object({
        category: z.enum(['success', 'info', 'warning', 'danger']),
        message: z.string(),
      })
    )
    .default([]),
});

/**
 * Parses a stored session; anything unreadable is treated as no session.
 */
export function parseStoredSession(raw: string): Session | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    Logger.warn('Discarding unreadable session', { error: errorMessage(error) });
    return null;
  }

  const parsed = sessionSchema.safeParse(value);
  if (!parsed.success) {
    Logger.warn('Discarding malformed session', { issues: parsed.error.issues.length });
    return null;
  }
  return parsed.data;
}

export class RedisSessionRepository implements ISessionRepository {
  constructor(private connection: RedisConnection) {}

  async get(sessionId: string): Promise<Session | null> {
    const client = await this.connection.getClient();
    const raw = await client.get(RedisKeys.session(sessionId));
    return raw === null ? null : parseStoredSession(raw);
  }

  async save(sessionId: string, session: Session, ttlSeconds: number): Promise<void> {
    const client = await this.connection.getClient();
    await client.set(RedisKeys.session(sessionId), JSON.stringify(session), { EX: ttlSeconds });
  }

  async destroy(sessionId: string): Promise<void> {
    const client = await this.connection.getClient();
    await client.del(RedisKeys.session(sessionId));
  }
}
