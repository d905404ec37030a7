import { IHabitRepository } from '../repositories/IHabitRepository';
import { GetUserHabitsUseCase } from './GetUserHabitsUseCase';
import { computeHabitStatistics, HabitStatistics, lastSevenDays } from '../utils/HabitStatistics';
import { Clock, systemClock, todayKey } from '../utils/dates';

export interface Dashboard {
  today: string;
  sevenDays: string[];
  habits: HabitStatistics[];
}

export class GetDashboardUseCase {
  constructor(
    private getUserHabitsUseCase: GetUserHabitsUseCase,
    private habitRepository: IHabitRepository,
    private clock: Clock = systemClock
  ) {}

  async execute(userId: number): Promise<Dashboard> {
    const today = todayKey(this.clock);
    const habits = await this.getUserHabitsUseCase.execute(userId);

    const statistics = await Promise.all(
      habits.map(async habit => {
        const completionDates = await this.habitRepository.getCompletionDates(habit.id);
        return computeHabitStatistics(habit, completionDates, today);
      })
    );

    return {
      today,
      sevenDays: lastSevenDays(today),
      habits: statistics,
    };
  }
}
