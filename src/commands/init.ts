import { existsSync, mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import chalk from 'chalk';
import { DEFAULT_DATA_DIR, DEFAULT_DB_FILE, ensureDatabase } from '../db/index.js';
import { configPath, defaultConfig, saveConfig } from '../services/config-service.js';
import { welcomePanel } from '../ui/boxen-panels.js';

export interface InitOptions {
  force?: boolean;
  dir?: string;
}

/**
 * `driftwatch init` — create the project directory, initialize the SQLite
 * database, write a default config.json, and show a welcome panel.
 */
export function runInit(opts: InitOptions = {}): void {
  const baseDir = resolve(opts.dir ?? DEFAULT_DATA_DIR);
  const dbPath = join(baseDir, DEFAULT_DB_FILE);

  // Guard against re-init without --force
  if (existsSync(configPath(baseDir)) && !opts.force) {
    console.log(chalk.yellow(`Already initialized at ${baseDir}. Use --force to reinitialize.`));
    return;
  }

  if (!existsSync(baseDir)) {
    mkdirSync(baseDir, { recursive: true });
  }

  // Creates the file and runs migrations
  ensureDatabase(dbPath);
  saveConfig(defaultConfig(dbPath), baseDir);

  console.log('');
  console.log(welcomePanel(dbPath));
  console.log('');
}
