import type { DetectorType, Severity } from '../models/enums.js';
import { severityFromScore } from '../models/enums.js';
import type { BaselineStats, DriftIncident, TraceEvent } from '../models/types.js';
import { generateId } from '../utils/id.js';
import { monotonicNow } from '../utils/time.js';

export interface IncidentDraft {
  score: number;
  message: string;
  suggested_action: string;
  context: Record<string, unknown>;
  /** Overrides the severity derived from `score`. */
  severity?: Severity;
}

/**
 * A drift detector: one event plus the cached baseline in, at most one
 * incident out. A "no drift" outcome is `null`, never an exception.
 */
export abstract class BaseDetector {
  abstract readonly kind: DetectorType;
  enabled: boolean;

  constructor(enabled = true) {
    this.enabled = enabled;
  }

  async check(event: TraceEvent, baseline: BaselineStats | null): Promise<DriftIncident | null> {
    if (!this.enabled) return null;
    return this.evaluate(event, baseline);
  }

  protected abstract evaluate(
    event: TraceEvent,
    baseline: BaselineStats | null,
  ): DriftIncident | null | Promise<DriftIncident | null>;

  protected createIncident(event: TraceEvent, draft: IncidentDraft): DriftIncident {
    const score = Math.min(1, Math.max(0, draft.score));
    return {
      id: generateId('inc'),
      agent_id: event.agent_id,
      run_id: event.run_id,
      detector: this.kind,
      severity: draft.severity ?? severityFromScore(score),
      score,
      message: draft.message,
      suggested_action: draft.suggested_action,
      timestamp: monotonicNow(),
      context: draft.context,
    };
  }
}
