import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { DetectorType, Severity } from '../models/enums.js';
import { DETECTOR_TYPES } from '../models/enums.js';
import { ConfigError } from '../models/errors.js';
import { DEFAULT_DATA_DIR, DEFAULT_DB_FILE } from '../db/connection.js';
import { isPlainObject } from '../utils/json.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';
import { isValidSeverity } from '../utils/validators.js';
import type { DriftMonitorOptions } from './monitor.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface MonitorSettings {
  calibration_runs: number;
  loop_window: number;
  loop_max_repeats: number;
  loop_sequence_length: number;
  similarity_threshold: number;
  spike_multiplier: number;
  absolute_token_limit: number;
  absolute_duration_limit_ms: number;
  embed_timeout_ms: number;
  detectors: Record<DetectorType, boolean>;
}

export interface AlertSettings {
  webhook_url: string | null;
  min_severity: Severity;
  cooldown_seconds: number;
}

export type DriftwatchConfig = {
  version: string;
  database: string;
  created_at: string;
  monitor?: Partial<MonitorSettings>;
  alerts?: Partial<AlertSettings>;
  log_level?: LogLevel;
};

/** Monitor options a config file can supply; the caller adds `agentId` and the store. */
export type ConfiguredMonitorOptions = Required<
  Pick<
    DriftMonitorOptions,
    | 'calibrationRuns'
    | 'loopWindow'
    | 'loopMaxRepeats'
    | 'loopSequenceLength'
    | 'similarityThreshold'
    | 'spikeMultiplier'
    | 'absoluteTokenLimit'
    | 'absoluteDurationLimitMs'
    | 'embedTimeoutMs'
    | 'detectors'
  >
>;

// ── Defaults ─────────────────────────────────────────────────────────────

export const CONFIG_VERSION = '1';

export const DEFAULT_MONITOR_SETTINGS: MonitorSettings = {
  calibration_runs: 30,
  loop_window: 20,
  loop_max_repeats: 4,
  loop_sequence_length: 3,
  similarity_threshold: 0.5,
  spike_multiplier: 2.5,
  absolute_token_limit: 50_000,
  absolute_duration_limit_ms: 300_000,
  embed_timeout_ms: 5_000,
  detectors: { action_loop: true, goal_drift: true, resource_spike: true },
};

export const DEFAULT_ALERT_SETTINGS: AlertSettings = {
  webhook_url: null,
  min_severity: 'MEDIUM',
  cooldown_seconds: 60,
};

const NUMERIC_MONITOR_KEYS = [
  'calibration_runs',
  'loop_window',
  'loop_max_repeats',
  'loop_sequence_length',
  'similarity_threshold',
  'spike_multiplier',
  'absolute_token_limit',
  'absolute_duration_limit_ms',
  'embed_timeout_ms',
] as const;

// ── Env var names ────────────────────────────────────────────────────────

export const ENV_KEYS = {
  webhookUrl: 'DRIFTWATCH_WEBHOOK_URL',
  logLevel: 'DRIFTWATCH_LOG_LEVEL',
} as const;

export function defaultConfig(database: string): DriftwatchConfig {
  return {
    version: CONFIG_VERSION,
    database,
    created_at: new Date().toISOString(),
    monitor: { ...DEFAULT_MONITOR_SETTINGS, detectors: { ...DEFAULT_MONITOR_SETTINGS.detectors } },
    alerts: { ...DEFAULT_ALERT_SETTINGS },
    log_level: 'warn',
  };
}

// ── Parsing ──────────────────────────────────────────────────────────────

function requireString(data: Record<string, unknown>, key: string): string {
  const val = data[key];
  if (typeof val !== 'string') throw new ConfigError(`${key} must be a string`, key);
  return val;
}

function parseMonitor(raw: unknown): Partial<MonitorSettings> {
  if (!isPlainObject(raw)) throw new ConfigError('monitor must be an object', 'monitor');
  const monitor: Partial<MonitorSettings> = {};

  for (const key of NUMERIC_MONITOR_KEYS) {
    const val = raw[key];
    if (val == null) continue;
    if (typeof val !== 'number' || !Number.isFinite(val) || val < 0) {
      throw new ConfigError(`monitor.${key} must be a non-negative number`, `monitor.${key}`);
    }
    monitor[key] = val;
  }

  if (raw.detectors != null) {
    const detectors = raw.detectors;
    if (!isPlainObject(detectors)) {
      throw new ConfigError('monitor.detectors must be an object', 'monitor.detectors');
    }
    const flags = { ...DEFAULT_MONITOR_SETTINGS.detectors };
    for (const kind of DETECTOR_TYPES) {
      const val = detectors[kind];
      if (val == null) continue;
      if (typeof val !== 'boolean') {
        throw new ConfigError(`monitor.detectors.${kind} must be true or false`, `monitor.detectors.${kind}`);
      }
      flags[kind] = val;
    }
    monitor.detectors = flags;
  }

  return monitor;
}

function parseAlerts(raw: unknown): Partial<AlertSettings> {
  if (!isPlainObject(raw)) throw new ConfigError('alerts must be an object', 'alerts');
  const alerts: Partial<AlertSettings> = {};

  const { webhook_url, min_severity, cooldown_seconds } = raw;
  if (webhook_url === null || typeof webhook_url === 'string') {
    alerts.webhook_url = webhook_url;
  } else if (webhook_url !== undefined) {
    throw new ConfigError('alerts.webhook_url must be a string or null', 'alerts.webhook_url');
  }
  if (min_severity != null) {
    if (typeof min_severity !== 'string' || !isValidSeverity(min_severity)) {
      throw new ConfigError('alerts.min_severity must be LOW, MEDIUM, HIGH or CRITICAL', 'alerts.min_severity');
    }
    alerts.min_severity = min_severity;
  }
  if (cooldown_seconds != null) {
    if (typeof cooldown_seconds !== 'number' || cooldown_seconds < 0) {
      throw new ConfigError('alerts.cooldown_seconds must be a non-negative number', 'alerts.cooldown_seconds');
    }
    alerts.cooldown_seconds = cooldown_seconds;
  }

  return alerts;
}

/** Validate a parsed config.json document. */
export function parseConfig(raw: unknown): DriftwatchConfig {
  if (!isPlainObject(raw)) throw new ConfigError('config must be a JSON object', 'root');

  const config: DriftwatchConfig = {
    version: requireString(raw, 'version'),
    database: requireString(raw, 'database'),
    created_at: requireString(raw, 'created_at'),
  };
  if (raw.monitor != null) config.monitor = parseMonitor(raw.monitor);
  if (raw.alerts != null) config.alerts = parseAlerts(raw.alerts);

  const logLevel = raw.log_level;
  if (logLevel != null) {
    if (typeof logLevel !== 'string' || !isLogLevel(logLevel)) {
      throw new ConfigError('log_level must be trace, debug, info, warn, error or silent', 'log_level');
    }
    config.log_level = logLevel;
  }

  return config;
}

// ── Config I/O ───────────────────────────────────────────────────────────

export function configPath(dir?: string): string {
  return join(resolve(dir ?? DEFAULT_DATA_DIR), 'config.json');
}

/** The project's config, or null when none exists or it cannot be read. */
export function loadConfig(dir?: string): DriftwatchConfig | null {
  const path = configPath(dir);
  if (!existsSync(path)) return null;
  try {
    return parseConfig(JSON.parse(readFileSync(path, 'utf-8')));
  } catch {
    return null;
  }
}

export function saveConfig(config: DriftwatchConfig, dir?: string): void {
  const path = configPath(dir);
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n');
}

/** Database file for a project directory: the configured one, else the default. */
export function resolveDatabasePath(dir?: string): string {
  return loadConfig(dir)?.database ?? join(resolve(dir ?? DEFAULT_DATA_DIR), DEFAULT_DB_FILE);
}

// ── Dot-notation config access ───────────────────────────────────────────

export function getConfigValue(config: DriftwatchConfig, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[part];
  }
  return current;
}

/** Interpret a command-line string as boolean, null, number, or text. */
export function coerceConfigValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

/**
 * Set a dotted key, creating intermediate objects. The result is
 * re-validated, so a value of the wrong type leaves `config` untouched
 * and throws a ConfigError.
 */
export function setConfigValue(config: DriftwatchConfig, key: string, value: string): DriftwatchConfig {
  const draft: Record<string, unknown> = JSON.parse(JSON.stringify(config));
  const parts = key.split('.');
  let current = draft;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[parts[parts.length - 1]] = coerceConfigValue(value);
  return parseConfig(draft);
}

// ── Resolution ───────────────────────────────────────────────────────────

/** Webhook URL. Priority: env var > config file. */
export function resolveWebhookUrl(config: DriftwatchConfig | null): string | null {
  const envVal = process.env[ENV_KEYS.webhookUrl];
  if (envVal) return envVal;
  return config?.alerts?.webhook_url ?? null;
}

export function resolveAlertSettings(config: DriftwatchConfig | null): AlertSettings {
  return {
    ...DEFAULT_ALERT_SETTINGS,
    ...config?.alerts,
    webhook_url: resolveWebhookUrl(config),
  };
}

export function resolveMonitorOptions(config: DriftwatchConfig | null): ConfiguredMonitorOptions {
  const settings: MonitorSettings = { ...DEFAULT_MONITOR_SETTINGS, ...config?.monitor };
  return {
    calibrationRuns: settings.calibration_runs,
    loopWindow: settings.loop_window,
    loopMaxRepeats: settings.loop_max_repeats,
    loopSequenceLength: settings.loop_sequence_length,
    similarityThreshold: settings.similarity_threshold,
    spikeMultiplier: settings.spike_multiplier,
    absoluteTokenLimit: settings.absolute_token_limit,
    absoluteDurationLimitMs: settings.absolute_duration_limit_ms,
    embedTimeoutMs: settings.embed_timeout_ms,
    detectors: { ...settings.detectors },
  };
}
