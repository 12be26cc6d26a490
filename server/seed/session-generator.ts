/**
 * Session Generator
 *
 * Splits a day's worth of tracked time into 1-3 sessions inside the working
 * window, with short random breaks between them. Output is cosmetic: it only
 * has to look like someone used the timer.
 *
 * Every emitted session satisfies `dayStart <= start < end <= dayEnd`.
 */

import type { Session } from '@shared/task-types';
import { randomFloat, randomInt, weightedChoice, type Rng } from './random';
import {
  DEFAULT_DAY_WINDOW,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  windowBounds,
  type DayWindow,
} from './time-window';

// ============================================================================
// Constants
// ============================================================================

const SESSION_COUNTS = [1, 2, 3] as const;
const SESSION_COUNT_WEIGHTS = [0.45, 0.4, 0.15] as const;

/** Share of the remaining budget a non-final session takes. */
const CHUNK_SHARE_MIN = 0.35;
const CHUNK_SHARE_MAX = 0.6;

const BREAK_MINUTES_MIN = 5;
const BREAK_MINUTES_MAX = 25;

/** Headroom kept before the end of the window when picking the first start. */
const END_OF_DAY_SLACK_MS = 30 * MS_PER_MINUTE;

// ============================================================================
// Generator
// ============================================================================

export function generateSessions(
  day: Date,
  totalHours: number,
  rng: Rng,
  window: DayWindow = DEFAULT_DAY_WINDOW
): Session[] {
  const totalMs = Math.floor(totalHours * MS_PER_HOUR);
  if (!(totalMs > 0)) {
    return [];
  }

  const { dayStart, dayEnd } = windowBounds(day, window);
  if (dayEnd <= dayStart) {
    return [];
  }

  const latestStart = Math.max(dayStart, dayEnd - totalMs - END_OF_DAY_SLACK_MS);
  let cursor = randomInt(rng, dayStart, latestStart);
  const count = weightedChoice(rng, SESSION_COUNTS, SESSION_COUNT_WEIGHTS);

  let remaining = totalMs;
  const sessions: Session[] = [];

  for (let i = 0; i < count; i++) {
    const isLast = i === count - 1;
    const chunk = isLast
      ? remaining
      : Math.floor(remaining * randomFloat(rng, CHUNK_SHARE_MIN, CHUNK_SHARE_MAX));
    const end = Math.min(cursor + chunk, dayEnd);
    if (end <= cursor) {
      break;
    }

    sessions.push({ start: cursor, end });
    remaining -= end - cursor;
    if (remaining <= 0) {
      break;
    }

    cursor = end + randomInt(rng, BREAK_MINUTES_MIN, BREAK_MINUTES_MAX) * MS_PER_MINUTE;
    if (cursor >= dayEnd) {
      break;
    }
  }

  return sessions;
}
