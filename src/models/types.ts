import type { ActionType, DetectorType, Severity } from './enums.js';

// ── Core Entities ─────────────────────────────────────────────────────────

/** One observed agent action. Immutable once persisted. */
export interface TraceEvent {
  id: string;
  agent_id: string;
  run_id: string;
  action_type: ActionType;
  action_name: string;
  /** Epoch milliseconds, strictly increasing within one process. */
  timestamp: number;
  token_count: number;
  duration_ms: number;
  input_data: Record<string, unknown>;
  output_data: Record<string, unknown>;
  metadata: Record<string, unknown>;
}

/** A detected anomaly, produced only by a detector. */
export interface DriftIncident {
  id: string;
  agent_id: string;
  run_id: string;
  detector: DetectorType;
  severity: Severity;
  /** Normalized to [0, 1]. */
  score: number;
  message: string;
  suggested_action: string;
  timestamp: number;
  context: Record<string, unknown>;
}

/** Per-agent statistical model of normal behaviour. */
export interface BaselineStats {
  agent_id: string;
  calibration_runs: number;
  mean_tokens_per_run: number;
  std_tokens_per_run: number;
  mean_tools_per_run: number;
  std_tools_per_run: number;
  mean_duration_ms: number;
  std_duration_ms: number;
  common_sequences: string[][];
  mean_goal_similarity: number;
  std_goal_similarity: number;
  is_calibrated: boolean;
  /** Recomputation time, epoch milliseconds. */
  updated_at: number;
}

/** One goal-similarity observation made by the goal-drift detector. */
export interface GoalSample {
  event_id: string;
  agent_id: string;
  run_id: string;
  similarity: number;
  timestamp: number;
}

// ── Aggregates ────────────────────────────────────────────────────────────

export interface RunAggregates {
  event_count: number;
  total_tokens: number;
  tool_calls: number;
  model_requests: number;
  total_duration_ms: number;
  /** Null when the run has no events. */
  start_time: number | null;
  end_time: number | null;
}

export interface AgentSummary {
  agent_id: string;
  event_count: number;
  run_count: number;
  last_seen: number;
}

// ── Input Types ───────────────────────────────────────────────────────────

export interface RecordEventInput {
  action_type: string;
  action_name: string;
  run_id?: string;
  token_count?: number;
  duration_ms?: number;
  input_data?: Record<string, unknown>;
  output_data?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

// ── Filter / Query Types ──────────────────────────────────────────────────

export interface IncidentFilter {
  agent_id?: string;
  /** Minimum timestamp, epoch milliseconds. */
  since?: number;
  severity?: Severity;
  limit?: number;
}

export interface EventFilter {
  agent_id?: string;
  run_id?: string;
  since?: number;
  limit?: number;
}
