import { IHabitRepository } from '../repositories/IHabitRepository';
import { DEFAULT_GOAL_DURATION, Habit } from '../entities/Habit';
import { HabitTrackerError } from '../errors/HabitTrackerError';
import { Clock, systemClock, todayKey } from '../utils/dates';
import { Logger } from '../../infrastructure/logger/Logger';

// Single underscores may group digits: "1_000"
const INTEGER_PATTERN = /^[+-]?\d+(_\d+)*$/;

/**
 * Reads the goal field of the habit form. Anything that is not an integer
 * (missing, empty, "abc", "1.5") falls back to the default goal; an integer
 * that is zero or negative is rejected.
 */
export function parseGoalDuration(input: string | null | undefined): number {
  if (input === null || input === undefined) {
    return DEFAULT_GOAL_DURATION;
  }

  const trimmed = input.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return DEFAULT_GOAL_DURATION;
  }

  const value = Number(trimmed.replace(/_/g, ''));
  if (!Number.isSafeInteger(value)) {
    return DEFAULT_GOAL_DURATION;
  }
  if (value <= 0) {
    throw new HabitTrackerError('InvalidConfiguration', 'Goal duration must be a positive number of days.');
  }
  return value;
}

export class CreateHabitUseCase {
  constructor(
    private habitRepository: IHabitRepository,
    private clock: Clock = systemClock
  ) {}

  async execute(
    userId: number,
    habitName: string | null | undefined,
    goalDurationInput?: string | null,
    username?: string
  ): Promise<Habit> {
    if (!habitName || habitName.trim().length === 0) {
      throw new HabitTrackerError('InvalidInput', 'Habit name cannot be empty.');
    }

    const trimmedName = habitName.trim();
    const goalDuration = parseGoalDuration(goalDurationInput);

    Logger.info('Creating habit', {
      userId,
      username: username || 'unknown',
      habitName: trimmedName,
      goalDuration,
    });

    const habit = await this.habitRepository.createHabit({
      userId,
      name: trimmedName,
      goalDuration,
      startDate: todayKey(this.clock),
    });

    Logger.info('Habit created successfully', {
      userId,
      username: username || 'unknown',
      habitId: habit.id,
      habitName: habit.name,
      startDate: habit.startDate,
    });

    return habit;
  }
}
