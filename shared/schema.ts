import { pgTable, text } from 'drizzle-orm/pg-core';

/**
 * Users Table
 * Owned by the task tracker; this project only looks users up by email.
 */
export const users = pgTable('users', {
  id: text('id').primaryKey(),
  email: text('email').notNull().unique(),
});

/**
 * User Data Table
 * One task document per user, stored as serialized JSON text.
 */
export const userData = pgTable('user_data', {
  userId: text('user_id')
    .primaryKey()
    .references(() => users.id),
  tasksJson: text('tasks_json').notNull(),
});
