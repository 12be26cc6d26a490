import { config } from 'dotenv';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pkg from 'pg';
const { Pool } = pkg;

// ============================================================================
// Environment
// ============================================================================

/**
 * Load a .env file into `env`. Variables already set are left alone, and a
 * missing file is not an error.
 */
export function loadEnvFile(path: string, env: NodeJS.ProcessEnv = process.env): void {
  const { parsed } = config({ path, processEnv: {} });
  for (const [key, value] of Object.entries(parsed ?? {})) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

// ============================================================================
// Connection string
// ============================================================================

const DEFAULT_POSTGRES_PORT = '5432';
const DEFAULT_POSTGRES_USER = 'postgres';

/**
 * Resolve the task tracker's connection string from the environment.
 *
 * DATABASE_URL wins; otherwise the URL is built from POSTGRES_* variables,
 * which need at least a host, a database and a password. Returns undefined
 * when neither is configured so the caller can report a usage error.
 */
export function resolveConnectionString(env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (env.DATABASE_URL) {
    return env.DATABASE_URL;
  }

  const { POSTGRES_HOST, POSTGRES_DATABASE, POSTGRES_PASSWORD } = env;
  if (!POSTGRES_HOST || !POSTGRES_DATABASE || !POSTGRES_PASSWORD) {
    return undefined;
  }

  const user = env.POSTGRES_USER || DEFAULT_POSTGRES_USER;
  const port = env.POSTGRES_PORT || DEFAULT_POSTGRES_PORT;
  return `postgresql://${user}:${encodeURIComponent(POSTGRES_PASSWORD)}@${POSTGRES_HOST}:${port}/${POSTGRES_DATABASE}`;
}

/** Mask the password in a connection string for log output. */
export function maskConnectionString(connectionString: string): string {
  return connectionString.replace(/:\/\/([^:/@]+):([^@]+)@/, '://$1:****@');
}

// ============================================================================
// Database
// ============================================================================

export type TaskTrackerDb = NodePgDatabase;

export interface DatabaseHandle {
  db: TaskTrackerDb;
  /** Close the underlying pool. */
  close(): Promise<void>;
}

export function openDatabase(connectionString: string): DatabaseHandle {
  // One run issues a handful of sequential queries; a single connection is enough.
  const pool = new Pool({ connectionString, max: 1 });
  return {
    db: drizzle(pool),
    close: () => pool.end(),
  };
}
