import type { DriftIncident, RecordEventInput } from '../models/types.js';
import type { EventStore } from './event-store.js';
import { DriftMonitor, type DriftCallback, type DriftMonitorOptions } from './monitor.js';
import { generateId } from '../utils/id.js';
import { isPlainObject } from '../utils/json.js';
import { validateEventInput } from '../utils/validators.js';

// ── Types ─────────────────────────────────────────────────────────────────

export const INGEST_FORMATS = ['json', 'jsonl'] as const;
export type IngestFormat = (typeof INGEST_FORMATS)[number];

export interface IngestRecord extends RecordEventInput {
  agent_id: string;
  run_id: string;
}

export interface IngestValidation {
  valid: IngestRecord[];
  errors: string[];
}

export interface RunGroup {
  agent_id: string;
  run_id: string;
  events: IngestRecord[];
}

export interface ReplayOptions {
  store: EventStore;
  monitor?: Omit<DriftMonitorOptions, 'agentId' | 'store' | 'dbPath'>;
  onIncident?: DriftCallback;
}

export interface ReplaySummary {
  agents: number;
  runs: number;
  events: number;
  incidents: DriftIncident[];
}

// ── Parsing ───────────────────────────────────────────────────────────────

export function isIngestFormat(value: string): value is IngestFormat {
  return INGEST_FORMATS.some((f) => f === value);
}

export function detectFormat(raw: string, path: string): IngestFormat {
  if (path.endsWith('.jsonl') || path.endsWith('.ndjson')) return 'jsonl';
  const trimmed = raw.trimStart();
  if (trimmed.startsWith('[')) return 'json';
  return 'jsonl';
}

export function parseRecords(raw: string, format: IngestFormat): unknown[] {
  if (format === 'json') {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed : [parsed];
  }

  // JSONL: one JSON object per line, blank lines and // comments skipped
  const records: unknown[] = [];
  raw.split('\n').forEach((line, i) => {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('//')) return;
    try {
      records.push(JSON.parse(trimmed));
    } catch {
      throw new Error(`Invalid JSON on line ${i + 1}`);
    }
  });
  return records;
}

// ── Validation ────────────────────────────────────────────────────────────

/**
 * Check each record against the event input rules. `agent` fills in (or
 * overrides) the agent id; records without a run id share one generated run.
 */
export function validateRecords(records: unknown[], agent?: string): IngestValidation {
  const valid: IngestRecord[] = [];
  const errors: string[] = [];
  let fallbackRunId: string | null = null;

  records.forEach((record, i) => {
    const result = validateEventInput(record, i);
    for (const e of result.errors) errors.push(`${e.field}: ${e.message}`);
    if (!result.valid || !isPlainObject(record)) return;

    const agentId = agent ?? record.agent_id;
    if (typeof agentId !== 'string' || agentId.length === 0) {
      errors.push(`events[${i}].agent_id: agent_id is required (or pass --agent)`);
      return;
    }

    const { action_type, action_name, run_id, token_count, duration_ms, input_data, output_data, metadata } = record;
    if (typeof action_type !== 'string' || typeof action_name !== 'string') return;

    valid.push({
      agent_id: agentId,
      run_id: typeof run_id === 'string' ? run_id : (fallbackRunId ??= generateId('run')),
      action_type,
      action_name,
      token_count: typeof token_count === 'number' ? token_count : undefined,
      duration_ms: typeof duration_ms === 'number' ? duration_ms : undefined,
      input_data: isPlainObject(input_data) ? input_data : undefined,
      output_data: isPlainObject(output_data) ? output_data : undefined,
      metadata: {
        ...(isPlainObject(metadata) ? metadata : {}),
        ...(typeof record.timestamp === 'number' ? { source_timestamp: record.timestamp } : {}),
      },
    });
  });

  return { valid, errors };
}

/** Group records by (agent, run), keeping first-appearance order. */
export function groupByRun(records: IngestRecord[]): RunGroup[] {
  const groups = new Map<string, RunGroup>();
  for (const record of records) {
    const key = JSON.stringify([record.agent_id, record.run_id]);
    let group = groups.get(key);
    if (!group) {
      group = { agent_id: record.agent_id, run_id: record.run_id, events: [] };
      groups.set(key, group);
    }
    group.events.push(record);
  }
  return [...groups.values()];
}

// ── Replay ────────────────────────────────────────────────────────────────

/**
 * Feed recorded runs through a DriftMonitor per agent, ending each run so
 * later runs are checked against the baseline built from earlier ones.
 */
export async function replayRecords(records: IngestRecord[], options: ReplayOptions): Promise<ReplaySummary> {
  const monitors = new Map<string, DriftMonitor>();
  const incidents: DriftIncident[] = [];
  const groups = groupByRun(records);

  for (const group of groups) {
    let monitor = monitors.get(group.agent_id);
    if (!monitor) {
      monitor = new DriftMonitor({ ...options.monitor, agentId: group.agent_id, store: options.store });
      if (options.onIncident) monitor.onDrift(options.onIncident);
      monitors.set(group.agent_id, monitor);
    }

    monitor.startRun(group.run_id);
    for (const event of group.events) {
      incidents.push(...(await monitor.recordEvent({ ...event, run_id: group.run_id })));
    }
    monitor.endRun(group.run_id);
  }

  return { agents: monitors.size, runs: groups.length, events: records.length, incidents };
}
