import { describe, it, expect } from 'vitest';
import { generateSessions } from '../session-generator';
import { createRandom } from '../random';
import { MS_PER_HOUR } from '../time-window';

/** Replays the given draws in order, then repeats them. */
function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

const DAY = new Date(2026, 2, 10);
const at = (hour: number, minute: number = 0, second: number = 0) =>
  new Date(2026, 2, 10, hour, minute, second).getTime();

describe('generateSessions', () => {
  it('returns one session covering the whole budget', () => {
    // start draw 0 -> 09:00, count draw 0 -> one session
    expect(generateSessions(DAY, 2, sequence([0, 0]))).toEqual([{ start: at(9), end: at(11) }]);
  });

  it('splits the budget across sessions with a break between them', () => {
    // count draw 0.5 -> two sessions; first takes 35% of 2h; break of 5 minutes
    expect(generateSessions(DAY, 2, sequence([0, 0.5, 0, 0]))).toEqual([
      { start: at(9), end: at(9, 42) },
      { start: at(9, 47), end: at(11, 5) },
    ]);
  });

  it('clamps a budget larger than the window to the window end', () => {
    expect(generateSessions(DAY, 12, sequence([0.7, 0]))).toEqual([
      { start: at(9), end: at(18, 30) },
    ]);
  });

  it('clamps the last of three sessions to the window end', () => {
    // 4h starting at the latest start (14:00), three sessions, 25 minute breaks
    const rng = sequence([0.999999999, 0.9, 0, 0.999, 0, 0.999]);
    expect(generateSessions(DAY, 4, rng)).toEqual([
      { start: at(14), end: at(15, 24) },
      { start: at(15, 49), end: at(16, 43, 36) },
      { start: at(17, 8, 36), end: at(18, 30) },
    ]);
  });

  it('returns nothing for a non-positive budget', () => {
    expect(generateSessions(DAY, 0, createRandom(1))).toEqual([]);
    expect(generateSessions(DAY, -1, createRandom(1))).toEqual([]);
  });

  it('returns nothing for an empty window', () => {
    const window = { start: { hour: 12, minute: 0 }, end: { hour: 12, minute: 0 } };
    expect(generateSessions(DAY, 1, createRandom(1), window)).toEqual([]);
  });

  it('keeps every session inside the window, ordered and within budget', () => {
    const rng = createRandom(2024);
    for (let i = 0; i < 500; i++) {
      const day = new Date(2026, 2, 2 + (i % 20));
      const hours = 0.1 + rng() * 11;
      const dayStart = new Date(day.getFullYear(), day.getMonth(), day.getDate(), 9).getTime();
      const dayEnd = new Date(day.getFullYear(), day.getMonth(), day.getDate(), 18, 30).getTime();

      const sessions = generateSessions(day, hours, rng);

      expect(sessions.length).toBeGreaterThanOrEqual(1);
      expect(sessions.length).toBeLessThanOrEqual(3);
      let total = 0;
      let previousEnd = -Infinity;
      for (const s of sessions) {
        const end = s.end ?? NaN;
        expect(s.start).toBeGreaterThanOrEqual(dayStart);
        expect(s.start).toBeLessThan(end);
        expect(end).toBeLessThanOrEqual(dayEnd);
        expect(s.start).toBeGreaterThan(previousEnd);
        previousEnd = end;
        total += end - s.start;
      }
      expect(total).toBeLessThanOrEqual(Math.floor(hours * MS_PER_HOUR));
    }
  });
});
