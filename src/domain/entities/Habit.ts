export const DEFAULT_GOAL_DURATION = 365;

export interface Habit {
  id: number;
  userId: number;
  name: string;
  goalDuration: number; // target number of completed days
  startDate: string; // YYYY-MM-DD format
}

export interface Completion {
  id: number;
  habitId: number;
  date: string; // YYYY-MM-DD format
}

export type CompletionState = 'completed' | 'not_completed';
