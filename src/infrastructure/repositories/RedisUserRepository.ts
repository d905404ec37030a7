import { WatchError } from 'redis';
import { RedisConnection } from '../config/redis';
import { RedisKeys } from './RedisKeys';
import { IUserRepository } from '../../domain/repositories/IUserRepository';
import { User } from '../../domain/entities/User';
import { errorMessage, Logger } from '../logger/Logger';

function userFromHash(hash: Record<string, string>): User | null {
  const id = Number(hash.id);
  if (!Number.isInteger(id) || !hash.username || !hash.passwordHash) {
    return null;
  }
  return { id, username: hash.username, passwordHash: hash.passwordHash };
}

export class RedisUserRepository implements IUserRepository {
  constructor(private connection: RedisConnection) {}

  async createUser(username: string, passwordHash: string): Promise<User | null> {
    const client = await this.connection.getClient();
    const usernameKey = RedisKeys.username(username);

    try {
      // Name claim and user hash commit together or not at all
      return await client.executeIsolated(async (isolated): Promise<User | null> => {
        await isolated.watch(usernameKey);
        if ((await isolated.exists(usernameKey)) > 0) {
          await isolated.unwatch();
          return null;
        }

        const id = await isolated.incr(RedisKeys.userSequence());
        await isolated
          .multi()
          .set(usernameKey, String(id))
          .hSet(RedisKeys.user(id), { id: String(id), username, passwordHash })
          .exec();
        return { id, username, passwordHash };
      });
    } catch (error) {
      if (error instanceof WatchError) {
        Logger.warn('Username claimed concurrently', { username });
        return null;
      }
      throw error;
    }
  }

  async findByUsername(username: string): Promise<User | null> {
    const client = await this.connection.getClient();
    const userId = await client.get(RedisKeys.username(username));
    if (userId === null) {
      return null;
    }
    return this.findById(Number(userId));
  }

  async findById(userId: number): Promise<User | null> {
    const client = await this.connection.getClient();
    return userFromHash(await client.hGetAll(RedisKeys.user(userId)));
  }

  async deleteUser(userId: number): Promise<boolean> {
    const user = await this.findById(userId);
    if (!user) {
      return false;
    }

    try {
      const client = await this.connection.getClient();
      const habitIds = await client.lRange(RedisKeys.userHabits(userId), 0, -1);

      const transaction = client.multi();
      for (const habitId of habitIds) {
        transaction.del(RedisKeys.habitCompletions(Number(habitId)));
        transaction.del(RedisKeys.habit(Number(habitId)));
      }
      transaction.del(RedisKeys.userHabits(userId));
      transaction.del(RedisKeys.user(userId));
      transaction.del(RedisKeys.username(user.username));
      await transaction.exec();

      Logger.info('User deleted with habits', { userId, habitCount: habitIds.length });
      return true;
    } catch (error) {
      Logger.error('Error deleting user', { userId, error: errorMessage(error) });
      throw error;
    }
  }
}
