import type Database from 'better-sqlite3';
import type {
  AgentSummary,
  BaselineStats,
  DriftIncident,
  EventFilter,
  GoalSample,
  IncidentFilter,
  RunAggregates,
  TraceEvent,
} from '../models/types.js';
import { decodeBaseline, decodeIncident, decodeTraceEvent, encodeBaseline } from '../models/codec.js';
import { CodecError, StoreError } from '../models/errors.js';
import { DatabaseConnection } from '../db/connection.js';
import { runMigrations } from '../db/migrations.js';
import { isPlainObject, safeJsonParse } from '../utils/json.js';

// ── Row shapes ────────────────────────────────────────────────────────────

interface TraceEventRow {
  id: string;
  agent_id: string;
  run_id: string;
  action_type: string;
  action_name: string;
  timestamp: number;
  token_count: number;
  duration_ms: number;
  input_data: string;
  output_data: string;
  metadata: string;
}

interface IncidentRow {
  id: string;
  agent_id: string;
  run_id: string;
  detector: string;
  severity: string;
  score: number;
  message: string;
  suggested_action: string;
  timestamp: number;
  context: string;
}

interface AggregateRow {
  event_count: number;
  total_tokens: number | null;
  tool_calls: number | null;
  model_requests: number | null;
  total_duration_ms: number | null;
  start_time: number | null;
  end_time: number | null;
}

// ── Helpers ───────────────────────────────────────────────────────────────

/** A payload column must hold a JSON object; anything else means the row is corrupt. */
function parseStoredObject(text: string, field: string): Record<string, unknown> {
  const parsed = safeJsonParse(text);
  if (!isPlainObject(parsed)) {
    throw new CodecError(`Stored ${field} is not a JSON object`, field);
  }
  return parsed;
}

function rowToEvent(row: TraceEventRow): TraceEvent {
  return decodeTraceEvent({
    ...row,
    input_data: parseStoredObject(row.input_data, 'input_data'),
    output_data: parseStoredObject(row.output_data, 'output_data'),
    metadata: parseStoredObject(row.metadata, 'metadata'),
  });
}

function rowToIncident(row: IncidentRow): DriftIncident {
  return decodeIncident({
    ...row,
    context: parseStoredObject(row.context, 'context'),
  });
}

/** Run a store operation, surfacing any failure as a StoreError. */
function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StoreError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new StoreError(`${operation} failed: ${reason}`, operation, err);
  }
}

/**
 * Durable log of trace events and drift incidents, plus the single current
 * baseline per agent.
 *
 * better-sqlite3 is synchronous, so every write is committed before the call
 * returns and is visible to the next read on this connection. Within a run,
 * chronological order is (timestamp, insertion order).
 */
export class EventStore {
  private db: Database.Database;
  private connection: DatabaseConnection | null;

  constructor(db: Database.Database, connection: DatabaseConnection | null = null) {
    this.db = db;
    this.connection = connection;
    guard('migrate', () => runMigrations(db));
  }

  /** Open (creating if needed) a database file owned by this store. */
  static open(dbPath?: string): EventStore {
    const connection = new DatabaseConnection(dbPath);
    const db = guard('open', () => connection.open());
    return new EventStore(db, connection);
  }

  /** Close the underlying connection if this store opened it. */
  close(): void {
    this.connection?.close();
  }

  // ── Writes ────────────────────────────────────────────────────────────

  append(event: TraceEvent): void {
    guard('append', () => {
      this.db
        .prepare<[string, string, string, string, string, number, number, number, string, string, string]>(
          `INSERT INTO trace_events
            (id, agent_id, run_id, action_type, action_name, timestamp,
             token_count, duration_ms, input_data, output_data, metadata)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          event.id,
          event.agent_id,
          event.run_id,
          event.action_type,
          event.action_name,
          event.timestamp,
          event.token_count,
          event.duration_ms,
          JSON.stringify(event.input_data),
          JSON.stringify(event.output_data),
          JSON.stringify(event.metadata),
        );
    });
  }

  appendIncident(incident: DriftIncident): void {
    guard('appendIncident', () => {
      this.db
        .prepare<[string, string, string, string, string, number, string, string, number, string]>(
          `INSERT INTO drift_incidents
            (id, agent_id, run_id, detector, severity, score,
             message, suggested_action, timestamp, context)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          incident.id,
          incident.agent_id,
          incident.run_id,
          incident.detector,
          incident.severity,
          incident.score,
          incident.message,
          incident.suggested_action,
          incident.timestamp,
          JSON.stringify(incident.context),
        );
    });
  }

  appendGoalSample(sample: GoalSample): void {
    guard('appendGoalSample', () => {
      this.db
        .prepare<[string, string, string, number, number]>(
          `INSERT OR REPLACE INTO goal_samples
            (event_id, agent_id, run_id, similarity, timestamp)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(sample.event_id, sample.agent_id, sample.run_id, sample.similarity, sample.timestamp);
    });
  }

  /** Replace the agent's baseline wholesale. */
  putBaseline(baseline: BaselineStats): void {
    guard('putBaseline', () => {
      this.db
        .prepare<[string, string, number]>(
          'INSERT OR REPLACE INTO baselines (agent_id, data, updated_at) VALUES (?, ?, ?)',
        )
        .run(baseline.agent_id, JSON.stringify(encodeBaseline(baseline)), baseline.updated_at);
    });
  }

  // ── Reads ─────────────────────────────────────────────────────────────

  /** Last `window` tool-call names of a run, oldest first. */
  recentActionNames(agentId: string, runId: string, window = 20): string[] {
    return guard('recentActionNames', () => {
      const rows = this.db
        .prepare<[string, string, number], { action_name: string }>(
          `SELECT action_name FROM trace_events
           WHERE agent_id = ? AND run_id = ? AND action_type = 'tool_call'
           ORDER BY timestamp DESC, rowid DESC LIMIT ?`,
        )
        .all(agentId, runId, window);
      return rows.map((r) => r.action_name).reverse();
    });
  }

  /** Distinct run ids of an agent, most recently active first. */
  runIds(agentId: string, limit = 50): string[] {
    return guard('runIds', () => {
      const rows = this.db
        .prepare<[string, number], { run_id: string }>(
          `SELECT run_id, MAX(timestamp) AS last_ts, MAX(rowid) AS last_seq
           FROM trace_events WHERE agent_id = ?
           GROUP BY run_id
           ORDER BY last_ts DESC, last_seq DESC LIMIT ?`,
        )
        .all(agentId, limit);
      return rows.map((r) => r.run_id);
    });
  }

  runAggregates(agentId: string, runId: string): RunAggregates {
    return guard('runAggregates', () => {
      const row = this.db
        .prepare<[string, string], AggregateRow>(
          `SELECT
             COUNT(*) AS event_count,
             SUM(token_count) AS total_tokens,
             SUM(CASE WHEN action_type = 'tool_call' THEN 1 ELSE 0 END) AS tool_calls,
             SUM(CASE WHEN action_type = 'model_request' THEN 1 ELSE 0 END) AS model_requests,
             SUM(duration_ms) AS total_duration_ms,
             MIN(timestamp) AS start_time,
             MAX(timestamp) AS end_time
           FROM trace_events WHERE agent_id = ? AND run_id = ?`,
        )
        .get(agentId, runId);

      return {
        event_count: row?.event_count ?? 0,
        total_tokens: row?.total_tokens ?? 0,
        tool_calls: row?.tool_calls ?? 0,
        model_requests: row?.model_requests ?? 0,
        total_duration_ms: row?.total_duration_ms ?? 0,
        start_time: row?.start_time ?? null,
        end_time: row?.end_time ?? null,
      };
    });
  }

  /** All events of a run in chronological order. */
  runEvents(agentId: string, runId: string): TraceEvent[] {
    return guard('runEvents', () =>
      this.db
        .prepare<[string, string], TraceEventRow>(
          `SELECT * FROM trace_events WHERE agent_id = ? AND run_id = ?
           ORDER BY timestamp ASC, rowid ASC`,
        )
        .all(agentId, runId)
        .map(rowToEvent),
    );
  }

  /** Events matching the filter, most recent first. */
  events(filter: EventFilter = {}): TraceEvent[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filter.agent_id) {
      conditions.push('agent_id = ?');
      params.push(filter.agent_id);
    }
    if (filter.run_id) {
      conditions.push('run_id = ?');
      params.push(filter.run_id);
    }
    if (filter.since != null) {
      conditions.push('timestamp >= ?');
      params.push(filter.since);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit ?? 100);

    return guard('events', () =>
      this.db
        .prepare<Array<string | number>, TraceEventRow>(
          `SELECT * FROM trace_events ${whereClause} ORDER BY timestamp DESC, rowid DESC LIMIT ?`,
        )
        .all(...params)
        .map(rowToEvent),
    );
  }

  /** Incidents matching the filter, most recent first. */
  incidents(filter: IncidentFilter = {}): DriftIncident[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filter.agent_id) {
      conditions.push('agent_id = ?');
      params.push(filter.agent_id);
    }
    if (filter.since != null) {
      conditions.push('timestamp >= ?');
      params.push(filter.since);
    }
    if (filter.severity) {
      conditions.push('severity = ?');
      params.push(filter.severity);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit ?? 50);

    return guard('incidents', () =>
      this.db
        .prepare<Array<string | number>, IncidentRow>(
          `SELECT * FROM drift_incidents ${whereClause} ORDER BY timestamp DESC, rowid DESC LIMIT ?`,
        )
        .all(...params)
        .map(rowToIncident),
    );
  }

  /** Current baseline, or null while the agent has never been calibrated. */
  getBaseline(agentId: string): BaselineStats | null {
    return guard('getBaseline', () => {
      const row = this.db
        .prepare<[string], { data: string }>('SELECT data FROM baselines WHERE agent_id = ?')
        .get(agentId);
      if (!row) return null;
      return decodeBaseline(safeJsonParse(row.data));
    });
  }

  goalSimilarities(agentId: string, runId: string): number[] {
    return guard('goalSimilarities', () =>
      this.db
        .prepare<[string, string], { similarity: number }>(
          `SELECT similarity FROM goal_samples WHERE agent_id = ? AND run_id = ?
           ORDER BY timestamp ASC`,
        )
        .all(agentId, runId)
        .map((r) => r.similarity),
    );
  }

  /** Every agent with recorded events, most recently seen first. */
  agents(): AgentSummary[] {
    return guard('agents', () =>
      this.db
        .prepare<[], AgentSummary>(
          `SELECT agent_id,
                  COUNT(*) AS event_count,
                  COUNT(DISTINCT run_id) AS run_count,
                  MAX(timestamp) AS last_seen
           FROM trace_events
           GROUP BY agent_id
           ORDER BY last_seen DESC`,
        )
        .all(),
    );
  }
}
