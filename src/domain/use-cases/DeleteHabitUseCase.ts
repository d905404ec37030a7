import { IHabitRepository } from '../repositories/IHabitRepository';
import { Habit } from '../entities/Habit';
import { HabitTrackerError } from '../errors/HabitTrackerError';
import { Logger } from '../../infrastructure/logger/Logger';

export class DeleteHabitUseCase {
  constructor(private habitRepository: IHabitRepository) {}

  async execute(userId: number, habitId: number, username?: string): Promise<Habit> {
    Logger.info('Deleting habit', {
      userId,
      username: username || 'unknown',
      habitId,
    });

    const habit = await this.habitRepository.findHabitForUser(userId, habitId);
    const deleted = habit ? await this.habitRepository.deleteHabit(userId, habitId) : false;

    if (!habit || !deleted) {
      Logger.warn('Habit not found or not owned by user', { userId, habitId });
      throw new HabitTrackerError('NotFoundOrForbidden', 'Habit not found or access denied.');
    }

    Logger.info('Habit deleted successfully', {
      userId,
      username: username || 'unknown',
      habitId,
      habitName: habit.name,
    });

    return habit;
  }
}
