import { InMemoryDatabase } from './InMemoryDatabase';
import { InMemoryHabitRepository } from './InMemoryHabitRepository';
import { IUserRepository } from '../../domain/repositories/IUserRepository';
import { User } from '../../domain/entities/User';

export class InMemoryUserRepository implements IUserRepository {
  private habitRepository: InMemoryHabitRepository;

  constructor(private db: InMemoryDatabase) {
    this.habitRepository = new InMemoryHabitRepository(db);
  }

  async createUser(username: string, passwordHash: string): Promise<User | null> {
    if (await this.findByUsername(username)) {
      return null;
    }
    const user: User = { id: this.db.nextId('users'), username, passwordHash };
    this.db.users.set(user.id, user);
    return { ...user };
  }

  async findByUsername(username: string): Promise<User | null> {
    for (const user of this.db.users.values()) {
      if (user.username === username) {
        return { ...user };
      }
    }
    return null;
  }

  async findById(userId: number): Promise<User | null> {
    const user = this.db.users.get(userId);
    return user ? { ...user } : null;
  }

  async deleteUser(userId: number): Promise<boolean> {
    if (!this.db.users.has(userId)) {
      return false;
    }

    for (const habit of await this.habitRepository.listHabits(userId)) {
      await this.habitRepository.deleteHabit(userId, habit.id);
    }
    this.db.users.delete(userId);
    return true;
  }
}
