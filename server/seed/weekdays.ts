import { eachDayOfInterval, isWeekend, startOfDay, subDays, subWeeks } from 'date-fns';

/**
 * Monday-Friday dates from `nWeeks` weeks before `today` through yesterday,
 * both ends inclusive, ascending, each at local midnight.
 */
export function pastWeekdays(nWeeks: number, today: Date = new Date()): Date[] {
  if (!(nWeeks >= 1)) {
    return [];
  }

  const midnight = startOfDay(today);
  const start = subWeeks(midnight, nWeeks);
  const yesterday = subDays(midnight, 1);

  return eachDayOfInterval({ start, end: yesterday }).filter((day) => !isWeekend(day));
}
