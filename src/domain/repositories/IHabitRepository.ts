import { CompletionState, Habit } from '../entities/Habit';

export interface NewHabit {
  userId: number;
  name: string;
  goalDuration: number;
  startDate: string;
}

export interface IHabitRepository {
  createHabit(habit: NewHabit): Promise<Habit>;
  listHabits(userId: number): Promise<Habit[]>;
  // Returns null when the habit does not exist or belongs to someone else
  findHabitForUser(userId: number, habitId: number): Promise<Habit | null>;
  // Removes the habit together with all of its completions
  deleteHabit(userId: number, habitId: number): Promise<boolean>;
  getCompletionDates(habitId: number): Promise<string[]>;
  // Returns null when the habit no longer exists; never writes a completion for it
  toggleCompletion(habitId: number, date: string): Promise<CompletionState | null>;
}
