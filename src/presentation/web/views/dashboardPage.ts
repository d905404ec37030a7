import { FlashMessage } from '../../../domain/entities/Session';
import { DEFAULT_GOAL_DURATION } from '../../../domain/entities/Habit';
import { Dashboard } from '../../../domain/use-cases/GetDashboardUseCase';
import { HabitStatistics } from '../../../domain/utils/HabitStatistics';
import { parseDateKey } from '../../../domain/utils/dates';
import { renderLayout } from './layout';
import { escapeHtml } from './html';

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

function weekdayLabel(dateKey: string): string {
  const date = parseDateKey(dateKey);
  return date ? WEEKDAYS[date.getUTCDay()] : dateKey;
}

function renderNewHabitForm(): string {
  return `<form class="card" method="post" action="/">
  <label>Habit <input name="habit_name" required></label>
  <label>Goal (days) <input name="goal_duration" type="number" min="1" value="${DEFAULT_GOAL_DURATION}"></label>
  <button type="submit">Add habit</button>
</form>`;
}

function renderHabit(habit: HabitStatistics): string {
  const strip = habit.sevenDays
    .map(
      day =>
        `<a class="${day.completed ? 'done' : ''}" href="/complete/${habit.habitId}/${day.date}" title="${day.date}">` +
        `${weekdayLabel(day.date)}<br>${day.completed ? '&#10003;' : '&middot;'}</a>`
    )
    .join('');

  const heatmap = habit.heatmap
    .map(day => `<span class="${day.status}" title="${day.date}: ${escapeHtml(day.label)}"></span>`)
    .join('');

  const { lifetime, goal } = habit;
  const pie = `conic-gradient(#10b981 0 ${lifetime.completedPercent}%, #f87171 ${lifetime.completedPercent}% 100%)`;

  return `<section class="card habit" id="habit-${habit.habitId}">
  <h2>${escapeHtml(habit.name)}</h2>
  <p>${escapeHtml(goal.goalStatus)} · since ${habit.startDate}</p>
  <div class="progress" title="${goal.progressPercent}%"><span style="width: ${goal.progressPercent}%"></span></div>
  <div class="strip">${strip}</div>
  <div class="stats">
    <div class="pie" style="background: ${pie}"></div>
    <ul>
      <li>${escapeHtml(lifetime.labels[0])}: ${lifetime.completedPercent}%</li>
      <li>${escapeHtml(lifetime.labels[1])}: ${lifetime.missedPercent}%</li>
      <li>${lifetime.daysSinceStart} days tracked</li>
    </ul>
  </div>
  <div class="heatmap">${heatmap}</div>
  <form method="post" action="/delete_habit/${habit.habitId}">
    <button type="submit">Delete</button>
  </form>
</section>`;
}

export function renderDashboardPage(dashboard: Dashboard, username: string, flashes: FlashMessage[]): string {
  const habits = dashboard.habits.length
    ? dashboard.habits.map(renderHabit).join('\n')
    : '<p class="card">No habits yet. Add your first one above.</p>';

  const content = `<h1>Your habits</h1>
${renderNewHabitForm()}
${habits}`;
  return renderLayout('Dashboard', content, flashes, username);
}
