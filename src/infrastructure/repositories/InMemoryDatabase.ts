import { Completion, Habit } from '../../domain/entities/Habit';
import { User } from '../../domain/entities/User';
import { Session } from '../../domain/entities/Session';

type Table = 'users' | 'habits' | 'completions';

export interface StoredSession {
  session: Session;
  expiresAt: number;
}

/**
 * Process-local tables for development without Redis and for tests.
 * Maps keep insertion order, which stands in for creation order.
 */
export class InMemoryDatabase {
  readonly users = new Map<number, User>();
  readonly habits = new Map<number, Habit>();
  readonly completions = new Map<number, Completion>();
  readonly sessions = new Map<string, StoredSession>();
  private sequences: Record<Table, number> = { users: 0, habits: 0, completions: 0 };

  nextId(table: Table): number {
    this.sequences[table] += 1;
    return this.sequences[table];
  }
}
