import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryDatabase } from './InMemoryDatabase';
import { InMemoryHabitRepository } from './InMemoryHabitRepository';
import { InMemoryUserRepository } from './InMemoryUserRepository';
import { InMemorySessionRepository } from './InMemorySessionRepository';

describe('in-memory repositories', () => {
  let db: InMemoryDatabase;
  let users: InMemoryUserRepository;
  let habits: InMemoryHabitRepository;

  beforeEach(() => {
    db = new InMemoryDatabase();
    users = new InMemoryUserRepository(db);
    habits = new InMemoryHabitRepository(db);
  });

  it('assigns increasing ids and keeps usernames unique', async () => {
    const alice = await users.createUser('alice', 'hash-a');
    const bob = await users.createUser('bob', 'hash-b');

    expect(alice?.id).toBe(1);
    expect(bob?.id).toBe(2);
    await expect(users.createUser('alice', 'hash-c')).resolves.toBeNull();
  });

  it('lists habits in creation order for their owner only', async () => {
    await habits.createHabit({ userId: 1, name: 'Read', goalDuration: 30, startDate: '2024-01-01' });
    await habits.createHabit({ userId: 2, name: 'Swim', goalDuration: 30, startDate: '2024-01-01' });
    await habits.createHabit({ userId: 1, name: 'Write', goalDuration: 30, startDate: '2024-01-02' });

    const names = (await habits.listHabits(1)).map(habit => habit.name);
    expect(names).toEqual(['Read', 'Write']);
  });

  it('cascades user deletion to habits and completions', async () => {
    const alice = await users.createUser('alice', 'hash-a');
    const bob = await users.createUser('bob', 'hash-b');
    if (!alice || !bob) {
      throw new Error('users not created');
    }
    const read = await habits.createHabit({ userId: alice.id, name: 'Read', goalDuration: 30, startDate: '2024-01-01' });
    const swim = await habits.createHabit({ userId: bob.id, name: 'Swim', goalDuration: 30, startDate: '2024-01-01' });
    await habits.toggleCompletion(read.id, '2024-01-01');
    await habits.toggleCompletion(swim.id, '2024-01-01');

    await expect(users.deleteUser(alice.id)).resolves.toBe(true);

    await expect(users.findById(alice.id)).resolves.toBeNull();
    await expect(habits.listHabits(alice.id)).resolves.toEqual([]);
    await expect(habits.getCompletionDates(read.id)).resolves.toEqual([]);
    await expect(habits.getCompletionDates(swim.id)).resolves.toEqual(['2024-01-01']);
    await expect(users.deleteUser(alice.id)).resolves.toBe(false);
  });

  it('does not record completions for a deleted habit', async () => {
    const habit = await habits.createHabit({ userId: 1, name: 'Read', goalDuration: 30, startDate: '2024-01-01' });
    await habits.deleteHabit(1, habit.id);

    await expect(habits.toggleCompletion(habit.id, '2024-01-02')).resolves.toBeNull();
    expect(db.completions.size).toBe(0);
  });

  it('returns copies so callers cannot mutate stored rows', async () => {
    const habit = await habits.createHabit({ userId: 1, name: 'Read', goalDuration: 30, startDate: '2024-01-01' });
    habit.name = 'Changed';

    const stored = await habits.findHabitForUser(1, habit.id);
    expect(stored?.name).toBe('Read');
  });

  it('expires sessions after their ttl', async () => {
    let now = new Date('2024-01-01T00:00:00.000Z');
    const sessions = new InMemorySessionRepository(db, () => now);

    await sessions.save('session-1', { userId: 1, username: 'alice', flashes: [] }, 60);
    now = new Date('2024-01-01T00:00:59.000Z');
    await expect(sessions.get('session-1')).resolves.toEqual({ userId: 1, username: 'alice', flashes: [] });

    now = new Date('2024-01-01T00:01:00.000Z');
    await expect(sessions.get('session-1')).resolves.toBeNull();
  });
});
