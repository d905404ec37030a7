import { Habit } from '../entities/Habit';
import { HabitTrackerError } from '../errors/HabitTrackerError';
import { addDays, dateRange, daysBetween, maxDateKey } from './dates';

export const STRIP_DAYS = 7;
export const HEATMAP_DAYS = 365;

export interface DayStatus {
  date: string;
  completed: boolean;
}

export type HeatmapStatus = 'completed' | 'missed' | 'pending';

export interface HeatmapDay extends DayStatus {
  status: HeatmapStatus;
  label: string;
}

export interface GoalProgress {
  completedCount: number;
  goalDuration: number;
  progressPercent: number;
  goalStatus: string;
}

export interface LifetimeBreakdown {
  daysSinceStart: number;
  missedDays: number;
  completedPercent: number;
  missedPercent: number;
  labels: readonly [string, string];
  data: [number, number];
}

export interface HabitStatistics {
  habitId: number;
  name: string;
  startDate: string;
  goal: GoalProgress;
  sevenDays: DayStatus[];
  lifetime: LifetimeBreakdown;
  heatmap: HeatmapDay[];
}

const HEATMAP_LABELS: Record<HeatmapStatus, string> = {
  completed: 'Completed',
  missed: 'Missed/Freeze',
  pending: 'Pending',
};

export const LIFETIME_LABELS = ['Completed', 'Missed/Freeze'] as const;

/**
 * Rounds the exact binary value to one decimal place. Only odd multiples of
 * 0.25 sit exactly on a tie; those go to the even tenth (6.25 -> 6.2,
 * 93.75 -> 93.8). A value such as 1.15, stored just below the tie, rounds down.
 */
export function roundToOneDecimal(value: number): number {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && Math.abs(quarters % 2) === 1) {
    const tenths = Math.floor(value * 10);
    return (tenths % 2 === 0 ? tenths : tenths + 1) / 10;
  }
  return Number(value.toFixed(1));
}

/**
 * The 7 dates ending at and including today, oldest first.
 */
export function lastSevenDays(today: string): string[] {
  return dateRange(addDays(today, -(STRIP_DAYS - 1)), today);
}

export function computeSevenDayStrip(completedDates: ReadonlySet<string>, today: string): DayStatus[] {
  return lastSevenDays(today).map(date => ({ date, completed: completedDates.has(date) }));
}

export function computeGoalProgress(completedCount: number, goalDuration: number): GoalProgress {
  if (!Number.isInteger(goalDuration) || goalDuration <= 0) {
    throw new HabitTrackerError('InvalidConfiguration', 'Goal duration must be a positive number of days.');
  }

  return {
    completedCount,
    goalDuration,
    progressPercent: Math.min(100, Math.floor((completedCount * 100) / goalDuration)),
    goalStatus: `${completedCount} / ${goalDuration} Days`,
  };
}

export function computeLifetimeBreakdown(startDate: string, completedCount: number, today: string): LifetimeBreakdown {
  const daysSinceStart = daysBetween(startDate, today) + 1;
  const missedDays = Math.max(0, daysSinceStart - completedCount);

  let completedPercent = 0;
  let missedPercent = 0;
  // A start date in the future leaves nothing to divide by
  if (daysSinceStart > 0) {
    completedPercent = roundToOneDecimal((completedCount / daysSinceStart) * 100);
    missedPercent = roundToOneDecimal((missedDays / daysSinceStart) * 100);
  }

  return {
    daysSinceStart,
    missedDays,
    completedPercent,
    missedPercent,
    labels: LIFETIME_LABELS,
    data: [completedPercent, missedPercent],
  };
}

/**
 * Day-by-day status from max(startDate, today - 364) through today.
 * A past day without a completion is missed; today without one is still pending.
 */
export function computeHeatmap(startDate: string, completedDates: ReadonlySet<string>, today: string): HeatmapDay[] {
  const windowStart = maxDateKey(startDate, addDays(today, -(HEATMAP_DAYS - 1)));

  return dateRange(windowStart, today).map(date => {
    const completed = completedDates.has(date);
    let status: HeatmapStatus;
    if (completed) {
      status = 'completed';
    } else if (date < today) {
      status = 'missed';
    } else {
      status = 'pending';
    }
    return { date, completed, status, label: HEATMAP_LABELS[status] };
  });
}

export function computeHabitStatistics(habit: Habit, completionDates: readonly string[], today: string): HabitStatistics {
  const completedDates = new Set(completionDates);
  // Every recorded completion counts, whatever its date
  const completedCount = completionDates.length;

  return {
    habitId: habit.id,
    name: habit.name,
    startDate: habit.startDate,
    goal: computeGoalProgress(completedCount, habit.goalDuration),
    sevenDays: computeSevenDayStrip(completedDates, today),
    lifetime: computeLifetimeBreakdown(habit.startDate, completedCount, today),
    heatmap: computeHeatmap(habit.startDate, completedDates, today),
  };
}
