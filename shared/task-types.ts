/**
 * Task Document Types
 *
 * Zod schemas for the task tracker's per-user JSON document
 * (`user_data.tasks_json`). The document format belongs to the tracker, so
 * every schema passes unknown keys through untouched: a read-modify-write
 * cycle must hand back everything it was given.
 */

import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

/**
 * One contiguous block of tracked work time.
 * `end` is absent (or null) while a timer is still running.
 */
export const SessionSchema = z
  .object({
    start: z.number(),
    end: z.number().nullable().optional(),
  })
  .passthrough();
export type Session = z.infer<typeof SessionSchema>;

export const TaskSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    name: z.string(),
    sessions: z.array(SessionSchema).default([]),
  })
  .passthrough();
export type Task = z.infer<typeof TaskSchema>;

export const UserDataSchema = z
  .object({
    tasks: z.array(TaskSchema).default([]),
  })
  .passthrough();
export type UserData = z.infer<typeof UserDataSchema>;

// ============================================================================
// Helpers
// ============================================================================

export function emptyUserData(): UserData {
  return { tasks: [] };
}

/**
 * Parse a stored `tasks_json` value.
 *
 * Throws a SyntaxError for text that is not JSON and a ZodError for a
 * document of the wrong shape.
 */
export function parseUserData(json: string): UserData {
  return UserDataSchema.parse(JSON.parse(json));
}

export function serializeUserData(data: UserData): string {
  return JSON.stringify(data);
}

/** Sessions with an end timestamp, i.e. ones that count toward totals. */
export function isCompletedSession(session: Session): session is Session & { end: number } {
  return typeof session.end === 'number';
}
