import { InMemoryDatabase } from './InMemoryDatabase';
import { IHabitRepository, NewHabit } from '../../domain/repositories/IHabitRepository';
import { CompletionState, Habit } from '../../domain/entities/Habit';

export class InMemoryHabitRepository implements IHabitRepository {
  constructor(private db: InMemoryDatabase) {}

  async createHabit(newHabit: NewHabit): Promise<Habit> {
    const habit: Habit = { id: this.db.nextId('habits'), ...newHabit };
    this.db.habits.set(habit.id, habit);
    return { ...habit };
  }

  async listHabits(userId: number): Promise<Habit[]> {
    return [...this.db.habits.values()].filter(h => h.userId === userId).map(h => ({ ...h }));
  }

  async findHabitForUser(userId: number, habitId: number): Promise<Habit | null> {
    const habit = this.db.habits.get(habitId);
    return habit && habit.userId === userId ? { ...habit } : null;
  }

  async deleteHabit(userId: number, habitId: number): Promise<boolean> {
    const habit = this.db.habits.get(habitId);
    if (!habit || habit.userId !== userId) {
      return false;
    }

    for (const [id, completion] of this.db.completions) {
      if (completion.habitId === habitId) {
        this.db.completions.delete(id);
      }
    }
    this.db.habits.delete(habitId);
    return true;
  }

  async getCompletionDates(habitId: number): Promise<string[]> {
    return [...this.db.completions.values()].filter(c => c.habitId === habitId).map(c => c.date);
  }

  async toggleCompletion(habitId: number, date: string): Promise<CompletionState | null> {
    if (!this.db.habits.has(habitId)) {
      return null;
    }

    for (const [id, completion] of this.db.completions) {
      if (completion.habitId === habitId && completion.date === date) {
        this.db.completions.delete(id);
        return 'not_completed';
      }
    }

    const id = this.db.nextId('completions');
    this.db.completions.set(id, { id, habitId, date });
    return 'completed';
  }
}
