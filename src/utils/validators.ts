import { ACTION_TYPES, DETECTOR_TYPES, SEVERITIES } from '../models/enums.js';
import type { ActionType, DetectorType, Severity } from '../models/enums.js';
import { isPlainObject } from './json.js';

// ── Type guards ──────────────────────────────────────────────────────────────

export function isValidActionType(value: string): value is ActionType {
  return ACTION_TYPES.some((t) => t === value);
}

export function isValidDetector(value: string): value is DetectorType {
  return DETECTOR_TYPES.some((d) => d === value);
}

export function isValidSeverity(value: string): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

// ── Validation result ────────────────────────────────────────────────────────

export interface ValidationError {
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

// ── Event input validation ───────────────────────────────────────────────────

/**
 * Validate the caller-supplied part of a trace event (what `recordEvent`
 * and the ingest command accept). `index` prefixes field names for batches.
 */
export function validateEventInput(input: unknown, index?: number): ValidationResult {
  const errors: ValidationError[] = [];
  const prefix = index != null ? `events[${index}].` : '';

  if (!isPlainObject(input)) {
    return { valid: false, errors: [{ field: `${prefix}root`, message: 'Event must be an object' }] };
  }

  const data = input;

  // Required fields
  if (!data.action_type || typeof data.action_type !== 'string') {
    errors.push({ field: `${prefix}action_type`, message: 'action_type is required and must be a string' });
  } else if (!isValidActionType(data.action_type)) {
    errors.push({
      field: `${prefix}action_type`,
      message: `Invalid action_type "${data.action_type}". Must be one of: ${ACTION_TYPES.join(', ')}`,
    });
  }

  if (!data.action_name || typeof data.action_name !== 'string') {
    errors.push({ field: `${prefix}action_name`, message: 'action_name is required and must be a string' });
  }

  if (data.run_id != null && (typeof data.run_id !== 'string' || data.run_id.length === 0)) {
    errors.push({ field: `${prefix}run_id`, message: 'run_id must be a non-empty string' });
  }

  // Numeric fields — must be finite non-negative numbers
  for (const field of ['token_count', 'duration_ms'] as const) {
    const val = data[field];
    if (val != null && (typeof val !== 'number' || !Number.isFinite(val) || val < 0)) {
      errors.push({ field: `${prefix}${field}`, message: `${field} must be a non-negative finite number` });
    }
  }

  // Payload maps
  for (const field of ['input_data', 'output_data', 'metadata'] as const) {
    if (data[field] != null && !isPlainObject(data[field])) {
      errors.push({ field: `${prefix}${field}`, message: `${field} must be an object` });
    }
  }

  return { valid: errors.length === 0, errors };
}
