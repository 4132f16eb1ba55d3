/**
 * Format a duration in milliseconds to a human-readable string.
 * Examples: "120ms", "3.2s", "1m 5s", "2h 30m"
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms)) return '-';
  if (ms < 0) return '-';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const totalSecs = Math.floor(ms / 1000);
  const mins = Math.floor(totalSecs / 60);
  const secs = totalSecs % 60;
  if (mins < 60) return secs > 0 ? `${mins}m ${secs}s` : `${mins}m`;
  const hours = Math.floor(mins / 60);
  const remainMins = mins % 60;
  return remainMins > 0 ? `${hours}h ${remainMins}m` : `${hours}h`;
}

/**
 * Format an epoch-millisecond timestamp as a relative time string.
 * Examples: "just now", "3m ago", "2h ago", "5d ago"
 */
export function formatRelativeTime(epochMs: number, now = Date.now()): string {
  if (!Number.isFinite(epochMs)) return '-';
  const diff = now - epochMs;
  if (diff < 0) return 'in the future';
  if (diff < 60_000) return 'just now';
  const mins = Math.floor(diff / 60_000);
  if (mins < 60) return `${mins}m ago`;
  const hours = Math.floor(mins / 60);
  if (hours < 24) return `${hours}h ago`;
  const days = Math.floor(hours / 24);
  return `${days}d ago`;
}

/**
 * Parse a human-friendly duration string into milliseconds.
 * Supports: "30s", "5m", "2h", "7d", "1w"
 */
export function parseDurationString(str: string): number {
  const match = str.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d|w)$/i);
  if (!match) throw new Error(`Invalid duration string: "${str}"`);
  const value = parseFloat(match[1]);
  const unit = match[2].toLowerCase();
  const multipliers: Record<string, number> = {
    ms: 1,
    s: 1_000,
    m: 60_000,
    h: 3_600_000,
    d: 86_400_000,
    w: 604_800_000,
  };
  return value * multipliers[unit];
}

/**
 * Convert a relative window ("24h", "7d") or an ISO date into an
 * epoch-millisecond lower bound.
 */
export function parseSinceToEpoch(since: string, now = Date.now()): number {
  if (/^\d{4}-\d{2}/.test(since)) {
    const ts = new Date(since).getTime();
    if (isNaN(ts)) throw new Error(`Invalid date: "${since}"`);
    return ts;
  }
  return now - parseDurationString(since);
}

/**
 * Format an epoch-millisecond timestamp for display.
 * Returns "YYYY-MM-DD HH:MM:SS" in local time.
 */
export function formatTimestamp(epochMs: number): string {
  const d = new Date(epochMs);
  if (isNaN(d.getTime())) return '-';
  const pad = (n: number) => n.toString().padStart(2, '0');
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

let lastTimestamp = 0;

/**
 * Wall-clock epoch milliseconds, strictly increasing within this process.
 * Two calls inside the same millisecond are separated by a microsecond.
 */
export function monotonicNow(): number {
  const now = Date.now();
  lastTimestamp = now > lastTimestamp ? now : lastTimestamp + 0.001;
  return lastTimestamp;
}
