import { format } from 'date-fns';
import { isCompletedSession, type Task } from '@shared/task-types';
import { MS_PER_HOUR } from './time-window';

export interface TaskSummary {
  name: string;
  /** Distinct local calendar days with at least one completed session. */
  days: number;
  hours: number;
}

export function summarizeTask(task: Task): TaskSummary {
  const completed = task.sessions.filter(isCompletedSession);
  const totalMs = completed.reduce((sum, s) => sum + (s.end - s.start), 0);
  const days = new Set(completed.map((s) => formatDay(new Date(s.start))));

  return { name: task.name, days: days.size, hours: totalMs / MS_PER_HOUR };
}

export function formatDay(day: Date): string {
  return format(day, 'yyyy-MM-dd');
}

export function formatSummaryRow(summary: TaskSummary): string {
  const name = summary.name.padEnd(20);
  const days = String(summary.days).padStart(2);
  const hours = summary.hours.toFixed(1).padStart(5);
  return `  ${name}  ${days} days  ${hours}h`;
}

/**
 * Lines printed after a run: a header naming the seeded range, a blank line,
 * then one row per task.
 */
export function formatSummary(email: string, days: Date[], summaries: TaskSummary[]): string[] {
  const range =
    days.length > 0 ? `(${formatDay(days[0])} → ${formatDay(days[days.length - 1])})` : '(none)';
  return [
    `Seeded ${days.length} weekdays ${range} for ${email}`,
    '',
    ...summaries.map(formatSummaryRow),
  ];
}
