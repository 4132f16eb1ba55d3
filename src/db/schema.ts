import type Database from 'better-sqlite3';

/**
 * SQLite schema for driftwatch.
 *
 *   - Timestamps are REAL epoch milliseconds
 *   - Payload maps (input/output data, metadata, incident context) are JSON TEXT
 *   - Baselines are one JSON document per agent, replaced wholesale
 *   - Implicit rowids break timestamp ties in insertion order
 */

export const SCHEMA_VERSION = 1;

const SCHEMA_V1 = `
-- ============================================================================
-- Schema version tracking
-- ============================================================================
CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER NOT NULL,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- ============================================================================
-- Trace events — one observed agent action
-- ============================================================================
CREATE TABLE IF NOT EXISTS trace_events (
    id TEXT PRIMARY KEY,
    agent_id TEXT NOT NULL,
    run_id TEXT NOT NULL,
    action_type TEXT NOT NULL
        CHECK (action_type IN ('tool_call', 'model_request', 'state_transition')),
    action_name TEXT NOT NULL,
    timestamp REAL NOT NULL,
    token_count INTEGER NOT NULL DEFAULT 0 CHECK (token_count >= 0),
    duration_ms REAL NOT NULL DEFAULT 0 CHECK (duration_ms >= 0),
    input_data TEXT NOT NULL DEFAULT '{}',
    output_data TEXT NOT NULL DEFAULT '{}',
    metadata TEXT NOT NULL DEFAULT '{}'
);

CREATE INDEX IF NOT EXISTS idx_trace_events_agent ON trace_events(agent_id, timestamp);
CREATE INDEX IF NOT EXISTS idx_trace_events_run ON trace_events(run_id, timestamp);

-- ============================================================================
-- Drift incidents — detector output, kept for audit and alerting
-- ============================================================================
CREATE TABLE IF NOT EXISTS drift_incidents (
    id TEXT PRIMARY KEY,
    agent_id TEXT NOT NULL,
    run_id TEXT NOT NULL,
    detector TEXT NOT NULL
        CHECK (detector IN ('action_loop', 'goal_drift', 'resource_spike')),
    severity TEXT NOT NULL
        CHECK (severity IN ('LOW', 'MEDIUM', 'HIGH', 'CRITICAL')),
    score REAL NOT NULL,
    message TEXT NOT NULL,
    suggested_action TEXT NOT NULL,
    timestamp REAL NOT NULL,
    context TEXT NOT NULL DEFAULT '{}'
);

CREATE INDEX IF NOT EXISTS idx_drift_incidents_agent ON drift_incidents(agent_id, timestamp);
CREATE INDEX IF NOT EXISTS idx_drift_incidents_severity ON drift_incidents(severity, timestamp);

-- ============================================================================
-- Baselines — exactly one current row per agent
-- ============================================================================
CREATE TABLE IF NOT EXISTS baselines (
    agent_id TEXT PRIMARY KEY,
    data TEXT NOT NULL,
    updated_at REAL NOT NULL
);

-- ============================================================================
-- Goal samples — similarity observations feeding goal calibration
-- ============================================================================
CREATE TABLE IF NOT EXISTS goal_samples (
    event_id TEXT PRIMARY KEY,
    agent_id TEXT NOT NULL,
    run_id TEXT NOT NULL,
    similarity REAL NOT NULL,
    timestamp REAL NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_goal_samples_run ON goal_samples(agent_id, run_id);
`;

/** Apply schema v1 to the database. */
export function applySchemaV1(db: Database.Database): void {
  db.exec(SCHEMA_V1);
  db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
}

/** Get the current schema version, or 0 if no schema exists. */
export function getSchemaVersion(db: Database.Database): number {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
    .get();

  if (!tableExists) return 0;

  const row = db
    .prepare('SELECT MAX(version) as version FROM schema_version')
    .get() as { version: number | null } | undefined;

  return row?.version ?? 0;
}
