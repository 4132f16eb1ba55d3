import chalk, { type ChalkInstance } from 'chalk';

/**
 * Leveled, structured logger with pluggable sinks.
 *
 * The engine runs inside a host agent, so it never writes to stdout unless
 * the level lets it through; hosts can swap in their own sink or silence it.
 *
 *   const log = createLogger().withContext({ agent_id: 'support-bot' });
 *   log.warn('Detector failed', { detector: 'goal_drift' });
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Merged into every entry's data. */
  defaultContext?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ── Sinks ─────────────────────────────────────────────────────────────────

const LEVEL_COLORS: Record<LogLevel, ChalkInstance> = {
  trace: chalk.gray,
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.redBright,
  silent: chalk.dim,
};

/** Human-readable, colorized stderr output. */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const color = LEVEL_COLORS[entry.level];
    const prefix = color(`[driftwatch] ${entry.level.toUpperCase()}`);
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + chalk.dim(JSON.stringify(entry.data)) : '';
    console.error(`${prefix} ${entry.message}${dataStr}`);
  }
}

/** Ring buffer, for tests and programmatic inspection. */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

// ── Logger ────────────────────────────────────────────────────────────────

export class StructuredLogger {
  private minLevel: LogLevel;
  private sinks: LogSink[];
  private defaultContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Child logger sharing sinks and level, with extra default context. */
  withContext(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: { ...this.defaultContext, ...context },
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (this.minLevel === 'silent' || LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const merged = { ...this.defaultContext, ...data };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { data: merged } : {}),
    };

    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }
}

/** Logger at the level named by DRIFTWATCH_LOG_LEVEL (default `info`). */
export function createLogger(config: LoggerConfig = {}): StructuredLogger {
  const envLevel = process.env.DRIFTWATCH_LOG_LEVEL;
  const level = config.level ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info');
  return new StructuredLogger({ ...config, level });
}
