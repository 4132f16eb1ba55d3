import chalk from 'chalk';
import {
  configPath,
  ENV_KEYS,
  getConfigValue,
  loadConfig,
  saveConfig,
  setConfigValue,
} from '../services/config-service.js';
import { printError } from './shared.js';

export interface ConfigOptions {
  dir?: string;
}

const NOT_INITIALIZED = '  No configuration found. Run `driftwatch init` first.';

// ── config list ──────────────────────────────────────────────────────────

export function runConfigList(opts: ConfigOptions = {}): void {
  const config = loadConfig(opts.dir);
  if (!config) {
    console.log(chalk.yellow(NOT_INITIALIZED));
    return;
  }

  console.log('');
  console.log(chalk.cyan.bold('  Configuration'));
  console.log(chalk.dim(`  ${configPath(opts.dir)}`));
  console.log('');

  const display = {
    ...config,
    alerts: config.alerts?.webhook_url ? { ...config.alerts, webhook_url: maskUrl(config.alerts.webhook_url) } : config.alerts,
  };
  console.log(JSON.stringify(display, null, 2));
  console.log('');

  // Show env var status
  const activeEnv = Object.values(ENV_KEYS).filter((v) => process.env[v]);
  if (activeEnv.length > 0) {
    console.log(chalk.dim('  Environment variables detected (these override config.json):'));
    for (const v of activeEnv) {
      const val = process.env[v] ?? '';
      console.log(chalk.dim(`    ${v} = ${v === ENV_KEYS.webhookUrl ? maskUrl(val) : val}`));
    }
    console.log('');
  }
}

// ── config get ───────────────────────────────────────────────────────────

export function runConfigGet(key: string, opts: ConfigOptions = {}): void {
  const config = loadConfig(opts.dir);
  if (!config) {
    console.error(chalk.yellow(NOT_INITIALIZED));
    return;
  }

  const value = getConfigValue(config, key);
  if (value === undefined) {
    console.log(chalk.dim(`  ${key}: (not set)`));
  } else if (value !== null && typeof value === 'object') {
    console.log(JSON.stringify(value, null, 2));
  } else {
    console.log(String(value));
  }
}

// ── config set ───────────────────────────────────────────────────────────

export function runConfigSet(key: string, value: string, opts: ConfigOptions = {}): void {
  const config = loadConfig(opts.dir);
  if (!config) {
    console.error(chalk.yellow(NOT_INITIALIZED));
    return;
  }

  try {
    saveConfig(setConfigValue(config, key, value), opts.dir);
  } catch (err) {
    printError(`Cannot set ${key}`, err);
    return;
  }

  console.log(chalk.greenBright(`  ${key} = ${key === 'alerts.webhook_url' ? maskUrl(value) : value}`));
}

// ── Helpers ──────────────────────────────────────────────────────────────

/** Webhook URLs embed their secret in the path; show only the host. */
function maskUrl(url: string): string {
  try {
    return `${new URL(url).origin}/***`;
  } catch {
    return '***';
  }
}
