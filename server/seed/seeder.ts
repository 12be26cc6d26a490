/**
 * Seeding Driver
 *
 * Pure read-modify-write transform over a user's task document. It only ever
 * adds: missing plan tasks are created, new sessions are appended when no
 * session on the task already starts at the same millisecond. Existing tasks,
 * sessions and unknown fields pass through unchanged.
 */

import { randomUUID } from 'crypto';
import type { Session, Task, UserData } from '@shared/task-types';
import { randomFloat, type Rng } from './random';
import { DEFAULT_SEED_PLAN, type SeedPlan, type TaskSeedSpec } from './seed-plan';
import { generateSessions } from './session-generator';
import { DEFAULT_DAY_WINDOW, type DayWindow } from './time-window';

export interface SeedOptions {
  /** Calendar days eligible for sessions, see `pastWeekdays`. */
  days: Date[];
  rng: Rng;
  plan?: SeedPlan;
  window?: DayWindow;
  /**
   * Id factory for created tasks. Defaults to `randomUUID()`. Must not draw
   * from `rng`, which restarts at the same seed on every run.
   */
  createId?: () => string;
}

export function seedUserData(data: UserData, options: SeedOptions): UserData {
  const { days, rng, plan = DEFAULT_SEED_PLAN, window = DEFAULT_DAY_WINDOW } = options;
  const createId = options.createId ?? randomUUID;

  const seeded: UserData = structuredClone(data);

  // Later duplicates win, so the last task with a given name is the one enriched.
  const byName = new Map<string, Task>();
  for (const task of seeded.tasks) {
    byName.set(task.name, task);
  }

  for (const spec of plan.tasks) {
    if (!byName.has(spec.name)) {
      const task: Task = { id: createId(), name: spec.name, sessions: [] };
      seeded.tasks.push(task);
      byName.set(spec.name, task);
    }
  }

  const addSessions = (task: Task, spec: TaskSeedSpec): void => {
    const existing = new Set(task.sessions.map((s) => s.start));
    for (const day of days) {
      if (rng() > spec.frequency) {
        continue;
      }
      const hours = randomFloat(rng, spec.minHours, spec.maxHours);
      for (const session of generateSessions(day, hours, rng, window)) {
        if (!existing.has(session.start)) {
          task.sessions.push(session);
          existing.add(session.start);
        }
      }
    }
  };

  for (const spec of plan.tasks) {
    const task = byName.get(spec.name);
    if (task) {
      addSessions(task, spec);
    }
  }
  for (const spec of plan.enrich) {
    const task = byName.get(spec.name);
    if (task) {
      addSessions(task, spec);
    }
  }

  for (const task of seeded.tasks) {
    task.sessions.sort(byStart);
  }

  return seeded;
}

function byStart(a: Session, b: Session): number {
  return a.start - b.start;
}
