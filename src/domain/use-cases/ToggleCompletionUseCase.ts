import { IHabitRepository } from '../repositories/IHabitRepository';
import { CompletionState } from '../entities/Habit';
import { HabitTrackerError } from '../errors/HabitTrackerError';
import { isDateKey } from '../utils/dates';
import { Logger } from '../../infrastructure/logger/Logger';

export class ToggleCompletionUseCase {
  constructor(private habitRepository: IHabitRepository) {}

  /**
   * Marks the habit done on `date`, or undoes it when it already is.
   * Any calendar date is accepted, including future ones.
   */
  async execute(userId: number, habitId: number, date: string, username?: string): Promise<CompletionState> {
    const habit = await this.habitRepository.findHabitForUser(userId, habitId);
    if (!habit) {
      Logger.warn('Habit not found or not owned by user', { userId, habitId });
      throw new HabitTrackerError('NotFoundOrForbidden', 'Habit not found or access denied.');
    }

    if (!isDateKey(date)) {
      Logger.debug('Ignoring completion toggle with malformed date', { userId, habitId, date });
      throw new HabitTrackerError('InvalidDate', 'Invalid date.');
    }

    const state = await this.habitRepository.toggleCompletion(habitId, date);
    if (state === null) {
      Logger.warn('Habit deleted before completion toggle', { userId, habitId, date });
      throw new HabitTrackerError('NotFoundOrForbidden', 'Habit not found or access denied.');
    }

    Logger.info('Habit completion toggled', {
      userId,
      username: username || 'unknown',
      habitId,
      habitName: habit.name,
      date,
      state,
    });

    return state;
  }
}
