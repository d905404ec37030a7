import { WatchError } from 'redis';
import { RedisConnection } from '../config/redis';
import { RedisKeys } from './RedisKeys';
import { IHabitRepository, NewHabit } from '../../domain/repositories/IHabitRepository';
import { CompletionState, Habit } from '../../domain/entities/Habit';
import { errorMessage, Logger } from '../logger/Logger';

export function habitFromHash(hash: Record<string, string>): Habit | null {
  const id = Number(hash.id);
  const userId = Number(hash.userId);
  const goalDuration = Number(hash.goalDuration);
  if (!Number.isInteger(id) || !Number.isInteger(userId) || !Number.isInteger(goalDuration) || !hash.name || !hash.startDate) {
    return null;
  }
  return { id, userId, name: hash.name, goalDuration, startDate: hash.startDate };
}

export class RedisHabitRepository implements IHabitRepository {
  constructor(private connection: RedisConnection) {}

  async createHabit(newHabit: NewHabit): Promise<Habit> {
    const client = await this.connection.getClient();
    const id = await client.incr(RedisKeys.habitSequence());
    const habit: Habit = { id, ...newHabit };

    await client
      .multi()
      .hSet(RedisKeys.habit(id), {
        id: String(id),
        userId: String(habit.userId),
        name: habit.name,
        goalDuration: String(habit.goalDuration),
        startDate: habit.startDate,
      })
      .rPush(RedisKeys.userHabits(habit.userId), String(id))
      .exec();

    Logger.debug('Stored habit', { habitId: id, userId: habit.userId });
    return habit;
  }

  async listHabits(userId: number): Promise<Habit[]> {
    try {
      const client = await this.connection.getClient();
      const habitIds = await client.lRange(RedisKeys.userHabits(userId), 0, -1);
      const hashes = await Promise.all(habitIds.map(id => client.hGetAll(RedisKeys.habit(Number(id)))));

      const habits: Habit[] = [];
      for (const hash of hashes) {
        const habit = habitFromHash(hash);
        if (habit && habit.userId === userId) {
          habits.push(habit);
        }
      }
      Logger.debug('Retrieved user habits', { userId, habitCount: habits.length });
      return habits;
    } catch (error) {
      Logger.error('Error getting user habits', { userId, error: errorMessage(error) });
      throw error;
    }
  }

  async findHabitForUser(userId: number, habitId: number): Promise<Habit | null> {
    const client = await this.connection.getClient();
    const habit = habitFromHash(await client.hGetAll(RedisKeys.habit(habitId)));
    if (!habit || habit.userId !== userId) {
      return null;
    }
    return habit;
  }

  async deleteHabit(userId: number, habitId: number): Promise<boolean> {
    const habit = await this.findHabitForUser(userId, habitId);
    if (!habit) {
      return false;
    }

    try {
      const client = await this.connection.getClient();
      await client
        .multi()
        .del(RedisKeys.habitCompletions(habitId))
        .del(RedisKeys.habit(habitId))
        .lRem(RedisKeys.userHabits(userId), 0, String(habitId))
        .exec();
      return true;
    } catch (error) {
      Logger.error('Error deleting habit', { userId, habitId, error: errorMessage(error) });
      throw error;
    }
  }

  async getCompletionDates(habitId: number): Promise<string[]> {
    const client = await this.connection.getClient();
    return client.hKeys(RedisKeys.habitCompletions(habitId));
  }

  async toggleCompletion(habitId: number, date: string): Promise<CompletionState | null> {
    const client = await this.connection.getClient();
    const habitKey = RedisKeys.habit(habitId);
    const key = RedisKeys.habitCompletions(habitId);

    try {
      // WATCH the habit so a delete landing mid-toggle aborts the write
      return await client.executeIsolated(async (isolated): Promise<CompletionState | null> => {
        await isolated.watch(habitKey);
        if ((await isolated.exists(habitKey)) === 0) {
          await isolated.unwatch();
          return null;
        }

        if (await isolated.hExists(key, date)) {
          await isolated.multi().hDel(key, date).exec();
          return 'not_completed';
        }

        const completionId = await isolated.incr(RedisKeys.completionSequence());
        // HSETNX: an overlapping toggle that inserted first keeps its row
        await isolated.multi().hSetNX(key, date, String(completionId)).exec();
        return 'completed';
      });
    } catch (error) {
      if (error instanceof WatchError) {
        Logger.warn('Habit changed during completion toggle', { habitId, date });
        return null;
      }
      throw error;
    }
  }
}
