#!/usr/bin/env tsx
/* eslint-disable no-console */

/**
 * Seed Sessions Script
 *
 * Populates a task tracker account with realistic work sessions over the past
 * weeks for demos. Reads the user's task document from user_data.tasks_json,
 * adds sessions to a fixed set of tasks (creating them if missing) and
 * upserts the document back. Never removes existing tasks or sessions.
 *
 * Run with: npm run seed-sessions -- --email you@example.com
 * Dry run:  npm run seed-sessions -- --email you@example.com --dry-run
 */

import { fileURLToPath } from 'node:url';
import { runSeedCommand } from '../server/seed/seed-command';

runSeedCommand(process.argv.slice(2), {
  envFile: fileURLToPath(new URL('../.env', import.meta.url)),
})
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
