import { set } from 'date-fns';

export const MS_PER_MINUTE = 60_000;
export const MS_PER_HOUR = 3_600_000;

export interface WallClockTime {
  hour: number;
  minute: number;
}

/** Working hours, in local time, that generated sessions must fall within. */
export interface DayWindow {
  start: WallClockTime;
  end: WallClockTime;
}

export const DEFAULT_DAY_WINDOW: DayWindow = {
  start: { hour: 9, minute: 0 },
  end: { hour: 18, minute: 30 },
};

/**
 * Epoch milliseconds of a local wall-clock time on the calendar day of `day`.
 * Any time-of-day already on `day` is ignored.
 */
export function toEpochMs(day: Date, hour: number, minute: number = 0): number {
  return set(day, { hours: hour, minutes: minute, seconds: 0, milliseconds: 0 }).getTime();
}

export function windowBounds(
  day: Date,
  window: DayWindow = DEFAULT_DAY_WINDOW
): { dayStart: number; dayEnd: number } {
  return {
    dayStart: toEpochMs(day, window.start.hour, window.start.minute),
    dayEnd: toEpochMs(day, window.end.hour, window.end.minute),
  };
}
