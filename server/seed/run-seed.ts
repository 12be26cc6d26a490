/**
 * One seed run: look the user up, load their document, add sessions for the
 * past weekdays and write the result back.
 */

import { emptyUserData, type UserData } from '@shared/task-types';
import type { IUserDataStore } from '../user-data-store';
import type { Rng } from './random';
import type { SeedPlan } from './seed-plan';
import { seedUserData } from './seeder';
import { summarizeTask, type TaskSummary } from './summary';
import { pastWeekdays } from './weekdays';

export const DEFAULT_WEEKS = 2;

export interface SeedRunOptions {
  email: string;
  store: IUserDataStore;
  rng: Rng;
  weeks?: number;
  /** Reference date for the weekday range. Defaults to now. */
  today?: Date;
  plan?: SeedPlan;
  /** Generate and summarize without saving. */
  dryRun?: boolean;
}

export type SeedRunResult =
  | { status: 'user-not-found'; email: string }
  | {
      status: 'seeded';
      email: string;
      userId: string;
      days: Date[];
      data: UserData;
      summaries: TaskSummary[];
      written: boolean;
    };

export async function runSeed(options: SeedRunOptions): Promise<SeedRunResult> {
  const { email, store, rng, weeks = DEFAULT_WEEKS, today = new Date(), plan } = options;

  const userId = await store.findUserIdByEmail(email);
  if (userId === undefined) {
    return { status: 'user-not-found', email };
  }

  const current = (await store.getUserData(userId)) ?? emptyUserData();
  const days = pastWeekdays(weeks, today);
  const data = seedUserData(current, { days, rng, plan });

  const written = !options.dryRun;
  if (written) {
    await store.saveUserData(userId, data);
  }

  return {
    status: 'seeded',
    email,
    userId,
    days,
    data,
    summaries: data.tasks.map(summarizeTask),
    written,
  };
}
