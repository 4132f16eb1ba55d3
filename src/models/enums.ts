// ── Action Type ───────────────────────────────────────────────────────────

export const ACTION_TYPES = ['tool_call', 'model_request', 'state_transition'] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

// ── Detector Type ─────────────────────────────────────────────────────────

export const DETECTOR_TYPES = ['action_loop', 'goal_drift', 'resource_spike'] as const;
export type DetectorType = (typeof DETECTOR_TYPES)[number];

// ── Severity ──────────────────────────────────────────────────────────────
// Ordered from least to most severe.

export const SEVERITIES = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Map a normalized [0, 1] score onto a severity band. */
export function severityFromScore(score: number): Severity {
  if (score >= 0.9) return 'CRITICAL';
  if (score >= 0.7) return 'HIGH';
  if (score >= 0.5) return 'MEDIUM';
  return 'LOW';
}

/** Numeric rank of a severity, for threshold comparisons. */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

// ── Run State ─────────────────────────────────────────────────────────────

export const RUN_STATES = ['idle', 'running', 'ended'] as const;
export type RunState = (typeof RUN_STATES)[number];

// ── Action Type Icons ─────────────────────────────────────────────────────
// Unicode symbols for cross-platform terminal display

export const ACTION_TYPE_ICONS: Record<ActionType, string> = {
  tool_call:        '\u{1F527}', // 🔧 wrench
  model_request:    '\u{1F916}', // 🤖 robot
  state_transition: '\u{25C6}',  // ◆ diamond
};

// ── Display labels ────────────────────────────────────────────────────────

export const ACTION_TYPE_LABELS: Record<ActionType, string> = {
  tool_call:        'Tool Call',
  model_request:    'Model Request',
  state_transition: 'State Transition',
};

export const DETECTOR_LABELS: Record<DetectorType, string> = {
  action_loop:    'Action Loop',
  goal_drift:     'Goal Drift',
  resource_spike: 'Resource Spike',
};
