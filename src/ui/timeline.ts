import chalk from 'chalk';
import type { DriftIncident, TraceEvent } from '../models/types.js';
import { actionIcon, actionLabel, label, severityBadge } from './theme.js';
import { formatDuration, formatTimestamp } from '../utils/time.js';
import { truncateJson } from '../utils/json.js';

export interface TimelineOptions {
  showInput?: boolean;
  showOutput?: boolean;
  /** Incidents of the same run, shown under the event that raised them. */
  incidents?: DriftIncident[];
  maxWidth?: number;
}

/** The last event at or before each incident's timestamp gets that incident. */
function attachIncidents(events: TraceEvent[], incidents: DriftIncident[]): Map<string, DriftIncident[]> {
  const byEvent = new Map<string, DriftIncident[]>();
  const sorted = [...incidents].sort((a, b) => a.timestamp - b.timestamp);

  let idx = 0;
  for (const incident of sorted) {
    while (idx + 1 < events.length && events[idx + 1].timestamp <= incident.timestamp) idx++;
    const event = events[idx];
    if (!event) continue;
    const list = byEvent.get(event.id) ?? [];
    list.push(incident);
    byEvent.set(event.id, list);
  }
  return byEvent;
}

/**
 * Render a run's events as a vertical timeline with Unicode box-drawing lines.
 *
 *   ┌─  1  🔧 Tool Call  "search_db"       120ms
 *   │       Tokens: 90
 *   │       ⚠  HIGH  Action loop: search_db called 4x consecutively
 *   └─  2  🤖 Model Request  "respond"      800ms
 */
export function renderTimeline(events: TraceEvent[], options: TimelineOptions = {}): string {
  const {
    showInput = false,
    showOutput = true,
    incidents = [],
    maxWidth = process.stdout.columns || 100,
  } = options;

  if (events.length === 0) {
    return chalk.dim('  No events recorded.');
  }

  const contentWidth = Math.max(20, Math.min(maxWidth, 120) - 10);
  const flagged = attachIncidents(events, incidents);
  const lines: string[] = [];

  events.forEach((event, i) => {
    const isFirst = i === 0;
    const isLast = i === events.length - 1;
    const connector = isFirst ? '┌' : isLast ? '└' : '├'; // ┌ └ ├
    const pipe = isLast ? ' ' : '│'; // │

    const num = chalk.dim(String(i + 1).padStart(2));
    const name = chalk.white.bold(`"${event.action_name}"`);
    const dur = event.duration_ms > 0 ? `  ${chalk.dim(formatDuration(event.duration_ms))}` : '';
    lines.push(
      `  ${chalk.dim(connector)}─ ${num}  ${actionIcon(event.action_type)} ${actionLabel(event.action_type)}  ${name}${dur}`,
    );
    lines.push(`  ${chalk.dim(pipe)}      ${label('At:')} ${chalk.dim(formatTimestamp(event.timestamp))}`);

    if (showInput && Object.keys(event.input_data).length > 0) {
      lines.push(`  ${chalk.dim(pipe)}      ${label('Input:')} ${chalk.dim(truncateJson(event.input_data, contentWidth))}`);
    }
    if (showOutput && Object.keys(event.output_data).length > 0) {
      lines.push(`  ${chalk.dim(pipe)}      ${label('Output:')} ${chalk.dim(truncateJson(event.output_data, contentWidth))}`);
    }
    if (event.token_count > 0) {
      lines.push(`  ${chalk.dim(pipe)}      ${label('Tokens:')} ${chalk.white(event.token_count.toLocaleString('en-US'))}`);
    }

    for (const incident of flagged.get(event.id) ?? []) {
      lines.push(`  ${chalk.dim(pipe)}      ${chalk.yellow('⚠')}  ${severityBadge(incident.severity)} ${chalk.redBright(incident.message)}`);
    }

    if (!isLast) {
      lines.push(`  ${chalk.dim(pipe)}`);
    }
  });

  return lines.join('\n');
}
