import { ACTION_TYPES, DETECTOR_TYPES, SEVERITIES } from './enums.js';
import type { ActionType, DetectorType, Severity } from './enums.js';
import type { BaselineStats, DriftIncident, TraceEvent } from './types.js';
import { CodecError } from './errors.js';
import { isPlainObject } from '../utils/json.js';

/**
 * JSON-safe encoding of the persisted entities.
 *
 * Encoding is a shallow copy with payload maps cloned; decoding validates
 * every field so that anything read back from disk, an ingest file, or an
 * export is a well-typed entity or a `CodecError` naming the bad field.
 */

export type EncodedRecord = Record<string, unknown>;

// ── Field readers ─────────────────────────────────────────────────────────

function asRecord(raw: unknown, entity: string): EncodedRecord {
  if (!isPlainObject(raw)) {
    throw new CodecError(`${entity} must be an object`, 'root');
  }
  return raw;
}

function readString(data: EncodedRecord, field: string): string {
  const val = data[field];
  if (typeof val !== 'string' || val.length === 0) {
    throw new CodecError(`${field} must be a non-empty string`, field);
  }
  return val;
}

function readText(data: EncodedRecord, field: string): string {
  const val = data[field];
  if (typeof val !== 'string') {
    throw new CodecError(`${field} must be a string`, field);
  }
  return val;
}

function readNumber(data: EncodedRecord, field: string, opts: { min?: number; fallback?: number } = {}): number {
  const val = data[field] ?? opts.fallback;
  if (typeof val !== 'number' || !Number.isFinite(val)) {
    throw new CodecError(`${field} must be a finite number`, field);
  }
  if (opts.min != null && val < opts.min) {
    throw new CodecError(`${field} must be >= ${opts.min}`, field);
  }
  return val;
}

function readMap(data: EncodedRecord, field: string): Record<string, unknown> {
  const val = data[field];
  if (val == null) return {};
  if (!isPlainObject(val)) {
    throw new CodecError(`${field} must be an object`, field);
  }
  return { ...val };
}

function readEnum<T extends string>(
  data: EncodedRecord,
  field: string,
  allowed: readonly T[],
): T {
  const val = data[field];
  const match = allowed.find((a) => a === val);
  if (match === undefined) {
    throw new CodecError(`${field} must be one of: ${allowed.join(', ')}`, field);
  }
  return match;
}

function readSequences(data: EncodedRecord, field: string): string[][] {
  const val = data[field];
  if (val == null) return [];
  if (!Array.isArray(val)) {
    throw new CodecError(`${field} must be an array`, field);
  }
  return val.map((seq: unknown, i) => {
    if (!Array.isArray(seq)) {
      throw new CodecError(`${field}[${i}] must be an array of strings`, field);
    }
    return seq.map((step: unknown) => {
      if (typeof step !== 'string') {
        throw new CodecError(`${field}[${i}] must be an array of strings`, field);
      }
      return step;
    });
  });
}

// ── TraceEvent ────────────────────────────────────────────────────────────

export function encodeTraceEvent(event: TraceEvent): EncodedRecord {
  return {
    id: event.id,
    agent_id: event.agent_id,
    run_id: event.run_id,
    action_type: event.action_type,
    action_name: event.action_name,
    timestamp: event.timestamp,
    token_count: event.token_count,
    duration_ms: event.duration_ms,
    input_data: { ...event.input_data },
    output_data: { ...event.output_data },
    metadata: { ...event.metadata },
  };
}

export function decodeTraceEvent(raw: unknown): TraceEvent {
  const data = asRecord(raw, 'TraceEvent');
  const actionType: ActionType = readEnum(data, 'action_type', ACTION_TYPES);
  return {
    id: readString(data, 'id'),
    agent_id: readString(data, 'agent_id'),
    run_id: readString(data, 'run_id'),
    action_type: actionType,
    action_name: readString(data, 'action_name'),
    timestamp: readNumber(data, 'timestamp'),
    token_count: readNumber(data, 'token_count', { min: 0, fallback: 0 }),
    duration_ms: readNumber(data, 'duration_ms', { min: 0, fallback: 0 }),
    input_data: readMap(data, 'input_data'),
    output_data: readMap(data, 'output_data'),
    metadata: readMap(data, 'metadata'),
  };
}

// ── DriftIncident ─────────────────────────────────────────────────────────

export function encodeIncident(incident: DriftIncident): EncodedRecord {
  return {
    id: incident.id,
    agent_id: incident.agent_id,
    run_id: incident.run_id,
    detector: incident.detector,
    severity: incident.severity,
    score: incident.score,
    message: incident.message,
    suggested_action: incident.suggested_action,
    timestamp: incident.timestamp,
    context: { ...incident.context },
  };
}

export function decodeIncident(raw: unknown): DriftIncident {
  const data = asRecord(raw, 'DriftIncident');
  const detector: DetectorType = readEnum(data, 'detector', DETECTOR_TYPES);
  const severity: Severity = readEnum(data, 'severity', SEVERITIES);
  const score = readNumber(data, 'score', { min: 0 });
  if (score > 1) {
    throw new CodecError('score must be <= 1', 'score');
  }
  return {
    id: readString(data, 'id'),
    agent_id: readString(data, 'agent_id'),
    run_id: readString(data, 'run_id'),
    detector,
    severity,
    score,
    message: readText(data, 'message'),
    suggested_action: readText(data, 'suggested_action'),
    timestamp: readNumber(data, 'timestamp'),
    context: readMap(data, 'context'),
  };
}

// ── BaselineStats ─────────────────────────────────────────────────────────

export function encodeBaseline(baseline: BaselineStats): EncodedRecord {
  return {
    agent_id: baseline.agent_id,
    calibration_runs: baseline.calibration_runs,
    mean_tokens_per_run: baseline.mean_tokens_per_run,
    std_tokens_per_run: baseline.std_tokens_per_run,
    mean_tools_per_run: baseline.mean_tools_per_run,
    std_tools_per_run: baseline.std_tools_per_run,
    mean_duration_ms: baseline.mean_duration_ms,
    std_duration_ms: baseline.std_duration_ms,
    common_sequences: baseline.common_sequences.map((seq) => [...seq]),
    mean_goal_similarity: baseline.mean_goal_similarity,
    std_goal_similarity: baseline.std_goal_similarity,
    is_calibrated: baseline.is_calibrated,
    updated_at: baseline.updated_at,
  };
}

export function decodeBaseline(raw: unknown): BaselineStats {
  const data = asRecord(raw, 'BaselineStats');
  const isCalibrated = data.is_calibrated;
  if (typeof isCalibrated !== 'boolean') {
    throw new CodecError('is_calibrated must be a boolean', 'is_calibrated');
  }
  return {
    agent_id: readString(data, 'agent_id'),
    calibration_runs: readNumber(data, 'calibration_runs', { min: 0 }),
    mean_tokens_per_run: readNumber(data, 'mean_tokens_per_run', { fallback: 0 }),
    std_tokens_per_run: readNumber(data, 'std_tokens_per_run', { min: 0, fallback: 0 }),
    mean_tools_per_run: readNumber(data, 'mean_tools_per_run', { fallback: 0 }),
    std_tools_per_run: readNumber(data, 'std_tools_per_run', { min: 0, fallback: 0 }),
    mean_duration_ms: readNumber(data, 'mean_duration_ms', { fallback: 0 }),
    std_duration_ms: readNumber(data, 'std_duration_ms', { min: 0, fallback: 0 }),
    common_sequences: readSequences(data, 'common_sequences'),
    mean_goal_similarity: readNumber(data, 'mean_goal_similarity', { fallback: 0 }),
    std_goal_similarity: readNumber(data, 'std_goal_similarity', { min: 0, fallback: 0 }),
    is_calibrated: isCalibrated,
    updated_at: readNumber(data, 'updated_at', { fallback: 0 }),
  };
}

/** An uncalibrated, all-zero baseline for an agent with no history. */
export function emptyBaseline(agentId: string, updatedAt = 0): BaselineStats {
  return {
    agent_id: agentId,
    calibration_runs: 0,
    mean_tokens_per_run: 0,
    std_tokens_per_run: 0,
    mean_tools_per_run: 0,
    std_tools_per_run: 0,
    mean_duration_ms: 0,
    std_duration_ms: 0,
    common_sequences: [],
    mean_goal_similarity: 0,
    std_goal_similarity: 0,
    is_calibrated: false,
    updated_at: updatedAt,
  };
}
