import { resolveConnectionString } from '../storage';
import { DEFAULT_SEED } from './random';
import { DEFAULT_WEEKS } from './run-seed';

/** Bad or missing command-line input. The script exits with code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface SeedCliArgs {
  mode: 'seed' | 'help';
  email: string;
  db: string;
  weeks: number;
  seed: number;
  dryRun: boolean;
}

export const USAGE = `Seed Sessions Script

Adds realistic work sessions over the past weeks to a task tracker account.
Safe to re-run: existing tasks and sessions are never removed.

Usage:
  npx tsx scripts/seed-sessions.ts --email <email> [options]

Options:
  --email <email>     User to seed (required)
  --db <url>          Postgres connection string (default: DATABASE_URL from .env)
  --weeks <n>         Weeks to look back (default: ${DEFAULT_WEEKS})
  --seed <n>          32-bit integer random seed (default: ${DEFAULT_SEED})
  --dry-run           Print the summary without writing to the database
  --help, -h          Show this help message
`;

/**
 * Parse `process.argv.slice(2)`. `--db` falls back to the environment, so
 * load .env before calling this.
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): SeedCliArgs {
  if (args.includes('--help') || args.includes('-h')) {
    return { mode: 'help', email: '', db: '', weeks: DEFAULT_WEEKS, seed: DEFAULT_SEED, dryRun: false };
  }

  const values = new Map<string, string>();
  let dryRun = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--dry-run') {
      dryRun = true;
      continue;
    }
    if (!VALUE_OPTIONS.has(arg)) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`${arg} requires a value`);
    }
    values.set(arg, value);
    i++;
  }

  const email = values.get('--email');
  if (!email) {
    throw new UsageError('--email is required');
  }

  const db = values.get('--db') ?? resolveConnectionString(env);
  if (!db) {
    throw new UsageError('No database URL: pass --db or set DATABASE_URL in .env');
  }

  return {
    mode: 'seed',
    email,
    db,
    weeks: parseIntOption('--weeks', values.get('--weeks'), DEFAULT_WEEKS, 1),
    seed: parseIntOption('--seed', values.get('--seed'), DEFAULT_SEED, INT32_MIN, INT32_MAX),
    dryRun,
  };
}

const VALUE_OPTIONS = new Set(['--email', '--db', '--weeks', '--seed']);

// createRandom keeps 32 bits of the seed
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

function parseIntOption(
  name: string,
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(parsed) || parsed < min || parsed > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new UsageError(`${name} must be an integer ${range} (got "${raw}")`);
  }
  return parsed;
}
