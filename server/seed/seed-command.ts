/* eslint-disable no-console */

/**
 * The seed-sessions command, minus the process: takes argv and returns the
 * exit code, so every exit path can be exercised without a database.
 *
 * Exit codes:
 *   0 - seeded, dry run done, help shown, or no such user
 *   1 - anything else failed (connection, SQL, malformed task document)
 *   2 - bad command-line input
 */

import { loadEnvFile, maskConnectionString } from '../storage';
import { connectUserDataStore, type UserDataStoreConnection } from '../user-data-store';
import { parseArgs, UsageError, USAGE, type SeedCliArgs } from './cli-args';
import { createRandom } from './random';
import { runSeed } from './run-seed';
import { formatSummary } from './summary';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface SeedCommandOptions {
  /** Loaded before parsing; variables already set win. */
  envFile?: string;
  env?: NodeJS.ProcessEnv;
  connect?: (connectionString: string) => UserDataStoreConnection;
  /** Reference date for the weekday range. Defaults to now. */
  today?: Date;
}

export async function runSeedCommand(
  argv: string[],
  options: SeedCommandOptions = {}
): Promise<number> {
  const { env = process.env, connect = connectUserDataStore } = options;

  let args: SeedCliArgs;
  try {
    if (options.envFile) {
      loadEnvFile(options.envFile, env);
    }
    args = parseArgs(argv, env);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}\n`);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    console.error('Fatal error:', error);
    return EXIT_FAILURE;
  }

  if (args.mode === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }

  try {
    await seed(args, connect, options.today);
    return EXIT_OK;
  } catch (error) {
    console.error('Fatal error:', error);
    return EXIT_FAILURE;
  }
}

async function seed(
  args: SeedCliArgs,
  connect: (connectionString: string) => UserDataStoreConnection,
  today: Date | undefined
): Promise<void> {
  if (args.dryRun) {
    console.log('[DRY RUN] No data will be written to the database.\n');
  }

  console.log(`Connecting to ${maskConnectionString(args.db)}...`);
  const connection = connect(args.db);

  try {
    const result = await runSeed({
      email: args.email,
      store: connection.store,
      rng: createRandom(args.seed),
      weeks: args.weeks,
      today,
      dryRun: args.dryRun,
    });

    if (result.status === 'user-not-found') {
      console.log(`No user found with email: ${result.email}`);
      return;
    }

    console.log('');
    for (const line of formatSummary(result.email, result.days, result.summaries)) {
      console.log(line);
    }
    if (!result.written) {
      console.log('\n[DRY RUN] Done. Re-run without --dry-run to write the sessions.');
    }
  } finally {
    await connection.close();
  }
}
