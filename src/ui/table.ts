import Table from 'cli-table3';
import chalk from 'chalk';
import type { AgentSummary, DriftIncident, RunAggregates } from '../models/types.js';
import { colors, detectorLabel, scoreBadge, severityBadge } from './theme.js';
import { formatDuration, formatRelativeTime } from '../utils/time.js';
import { shortId } from '../utils/id.js';

// ── Generic table factory ─────────────────────────────────────────────────

export function createTable(headers: string[], colWidths?: number[]): Table.Table {
  return new Table({
    head: headers.map((h) => colors.primary(h)),
    style: {
      head: [],
      border: ['dim'],
    },
    ...(colWidths ? { colWidths } : {}),
  });
}

// ── Incident table ────────────────────────────────────────────────────────

export function incidentTable(incidents: DriftIncident[], now = Date.now()): string {
  const table = createTable(['When', 'Severity', 'Detector', 'Score', 'Agent', 'Run', 'Message']);

  for (const i of incidents) {
    table.push([
      chalk.dim(formatRelativeTime(i.timestamp, now)),
      severityBadge(i.severity),
      detectorLabel(i.detector),
      scoreBadge(i.score),
      chalk.white(i.agent_id),
      chalk.dim(shortId(i.run_id)),
      chalk.white(truncate(i.message, 60)),
    ]);
  }

  return table.toString();
}

// ── Run table ─────────────────────────────────────────────────────────────

export interface RunRow {
  run_id: string;
  stats: RunAggregates;
  incident_count: number;
}

export function runTable(rows: RunRow[], now = Date.now()): string {
  const table = createTable(['Run', 'Events', 'Tools', 'Model', 'Tokens', 'Duration', 'Incidents', 'Last Event']);

  for (const { run_id, stats, incident_count } of rows) {
    table.push([
      chalk.white(run_id),
      chalk.white(String(stats.event_count)),
      chalk.white(String(stats.tool_calls)),
      chalk.white(String(stats.model_requests)),
      chalk.white(stats.total_tokens.toLocaleString('en-US')),
      chalk.white(formatDuration(stats.total_duration_ms)),
      incident_count > 0 ? chalk.redBright(String(incident_count)) : chalk.dim('0'),
      stats.end_time != null ? chalk.dim(formatRelativeTime(stats.end_time, now)) : chalk.dim('-'),
    ]);
  }

  return table.toString();
}

// ── Agent table ───────────────────────────────────────────────────────────

export function agentTable(agents: AgentSummary[], now = Date.now()): string {
  const table = createTable(['Agent', 'Runs', 'Events', 'Last Seen']);

  for (const a of agents) {
    table.push([
      chalk.white(a.agent_id),
      chalk.white(String(a.run_count)),
      chalk.white(String(a.event_count)),
      chalk.dim(formatRelativeTime(a.last_seen, now)),
    ]);
  }

  return table.toString();
}

// ── Helpers ───────────────────────────────────────────────────────────────

function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + '...';
}
