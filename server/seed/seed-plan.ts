/**
 * How often, and for how long, each seeded task gets worked on.
 */

export interface TaskSeedSpec {
  name: string;
  /** Probability in [0, 1] that the task is worked on for a given weekday. */
  frequency: number;
  minHours: number;
  maxHours: number;
}

export interface SeedPlan {
  /** Created when missing, then seeded. */
  tasks: TaskSeedSpec[];
  /** Seeded only when the user already has a task by this name. */
  enrich: TaskSeedSpec[];
}

export const SEED_TASKS: TaskSeedSpec[] = [
  { name: 'deep work', frequency: 0.85, minHours: 1.0, maxHours: 3.5 },
  { name: 'email & slack', frequency: 0.9, minHours: 0.3, maxHours: 1.2 },
  { name: 'code review', frequency: 0.65, minHours: 0.5, maxHours: 2.0 },
  { name: 'meetings', frequency: 0.55, minHours: 0.5, maxHours: 2.0 },
  { name: 'planning', frequency: 0.4, minHours: 0.3, maxHours: 1.0 },
];

export const ENRICHABLE_TASKS: TaskSeedSpec[] = [
  { name: 'React Query', frequency: 0.55, minHours: 0.5, maxHours: 2.5 },
  { name: 'Interview Prep', frequency: 0.45, minHours: 0.5, maxHours: 1.5 },
];

export const DEFAULT_SEED_PLAN: SeedPlan = {
  tasks: SEED_TASKS,
  enrich: ENRICHABLE_TASKS,
};
