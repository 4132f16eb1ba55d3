import chalk from 'chalk';
import { ensureDatabase } from '../db/index.js';
import { EventStore } from '../services/event-store.js';
import { ENV_KEYS, loadConfig, resolveDatabasePath } from '../services/config-service.js';
import { createLogger, isLogLevel, type StructuredLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/json.js';

export interface DirOption {
  dir?: string;
}

/** Open the project's database, creating and migrating it if needed. */
export function openStore(dir?: string): EventStore {
  return new EventStore(ensureDatabase(resolveDatabasePath(dir)));
}

/** Logger for CLI runs. Priority: env var > config file > `warn`. */
export function cliLogger(dir?: string): StructuredLogger {
  const envLevel = process.env[ENV_KEYS.logLevel];
  const level = envLevel && isLogLevel(envLevel) ? envLevel : loadConfig(dir)?.log_level ?? 'warn';
  return createLogger({ level });
}

export function printError(prefix: string, err: unknown): void {
  console.error(chalk.red(`  ${prefix}: ${errorMessage(err)}`));
}
