import type { BaselineStats, DriftIncident, TraceEvent } from '../models/types.js';
import { BaseDetector } from './base.js';

/** The slice of the event store loop detection reads through. */
export interface ActionHistory {
  recentActionNames(agentId: string, runId: string, window: number): string[];
}

export interface ActionLoopOptions {
  windowSize?: number;
  maxRepeats?: number;
  /** Longest repeating pattern considered by the sequence check. */
  sequenceLength?: number;
  enabled?: boolean;
}

/**
 * Flags agents stuck in repetitive tool-call cycles over a sliding window of
 * the run's most recent tool calls:
 *
 *   search → search → search → search           (single-tool repeat)
 *   fetch → parse → fetch → parse → fetch → parse (sequence repeat)
 *
 * The sequence check reports the shortest qualifying pattern length.
 */
export class ActionLoopDetector extends BaseDetector {
  readonly kind = 'action_loop' as const;
  readonly windowSize: number;
  readonly maxRepeats: number;
  readonly sequenceLength: number;
  private history: ActionHistory;

  constructor(history: ActionHistory, options: ActionLoopOptions = {}) {
    super(options.enabled ?? true);
    this.history = history;
    this.windowSize = options.windowSize ?? 20;
    this.maxRepeats = options.maxRepeats ?? 4;
    this.sequenceLength = options.sequenceLength ?? 3;
  }

  protected evaluate(event: TraceEvent, _baseline: BaselineStats | null): DriftIncident | null {
    if (event.action_type !== 'tool_call') return null;

    const recent = this.history.recentActionNames(event.agent_id, event.run_id, this.windowSize);
    if (recent.length < this.maxRepeats) return null;

    return this.checkSingleRepeat(recent, event) ?? this.checkSequenceRepeat(recent, event);
  }

  private score(repeatCount: number): number {
    return Math.min(1, repeatCount / (this.maxRepeats * 2));
  }

  private checkSingleRepeat(recent: string[], event: TraceEvent): DriftIncident | null {
    const tail = recent.slice(-this.maxRepeats);
    const toolName = tail[0];
    if (!tail.every((name) => name === toolName)) return null;

    let repeatCount = 0;
    for (let i = recent.length - 1; i >= 0 && recent[i] === toolName; i--) {
      repeatCount++;
    }
    if (repeatCount < this.maxRepeats) return null;

    return this.createIncident(event, {
      score: this.score(repeatCount),
      message: `Action loop: ${toolName} called ${repeatCount}x consecutively`,
      suggested_action: `Check ${toolName} input/output for stale data or error loops`,
      context: {
        tool_name: toolName,
        repeat_count: repeatCount,
        recent_actions: recent.slice(-10),
      },
    });
  }

  private checkSequenceRepeat(recent: string[], event: TraceEvent): DriftIncident | null {
    for (let seqLen = 2; seqLen <= this.sequenceLength; seqLen++) {
      if (recent.length < seqLen * this.maxRepeats) continue;

      const pattern = recent.slice(-seqLen);
      let repeatCount = 0;
      for (let idx = recent.length - seqLen; idx >= 0; idx -= seqLen) {
        const matches = pattern.every((name, offset) => recent[idx + offset] === name);
        if (!matches) break;
        repeatCount++;
      }

      if (repeatCount >= this.maxRepeats) {
        return this.createIncident(event, {
          score: this.score(repeatCount),
          message: `Action loop: sequence [${pattern.join(' → ')}] repeated ${repeatCount}x`,
          suggested_action: 'Review agent logic for circular tool dependencies',
          context: {
            sequence: pattern,
            repeat_count: repeatCount,
            recent_actions: recent.slice(-15),
          },
        });
      }
    }
    return null;
  }
}
