import type { BaselineStats } from '../models/types.js';
import { emptyBaseline } from '../models/codec.js';
import type { EventStore } from './event-store.js';
import { createLogger, type StructuredLogger } from '../utils/logger.js';

export interface CalibratorOptions {
  /** Lookback and calibration threshold, in runs. */
  requiredRuns?: number;
  logger?: StructuredLogger;
  clock?: () => number;
}

const SEQUENCE_WINDOW = 50;
const MIN_SEQUENCE_LENGTH = 2;
const MAX_SEQUENCE_LENGTH = 4;
const TOP_SEQUENCES = 5;

// ── Statistics ────────────────────────────────────────────────────────────

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Population standard deviation; 0 for fewer than two values. */
export function populationStd(values: number[]): number {
  if (values.length <= 1) return 0;
  const mu = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - mu) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Most frequent contiguous action subsequences (length 2..4) across runs.
 * A subsequence counts at most once per run; ties keep first-seen order.
 */
export function findCommonSequences(sequences: string[][], topN = TOP_SEQUENCES): string[][] {
  const counts = new Map<string, { steps: string[]; count: number }>();

  for (const seq of sequences) {
    const seen = new Set<string>();
    const maxLength = Math.min(seq.length, MAX_SEQUENCE_LENGTH);
    for (let length = MIN_SEQUENCE_LENGTH; length <= maxLength; length++) {
      for (let i = 0; i + length <= seq.length; i++) {
        const steps = seq.slice(i, i + length);
        const key = JSON.stringify(steps);
        if (seen.has(key)) continue;
        seen.add(key);

        const entry = counts.get(key);
        if (entry) {
          entry.count++;
        } else {
          counts.set(key, { steps, count: 1 });
        }
      }
    }
  }

  return [...counts.values()]
    .sort((a, b) => b.count - a.count)
    .slice(0, topN)
    .map((entry) => entry.steps);
}

// ── Calibrator ────────────────────────────────────────────────────────────

/**
 * Rebuilds an agent's baseline from its most recent runs. Every call
 * recomputes from scratch and replaces the stored baseline, so repeated
 * calls over unchanged history give the same statistics.
 */
export class BaselineCalibrator {
  readonly requiredRuns: number;
  private store: EventStore;
  private logger: StructuredLogger;
  private clock: () => number;

  constructor(store: EventStore, options: CalibratorOptions = {}) {
    this.store = store;
    this.requiredRuns = options.requiredRuns ?? 30;
    this.logger = options.logger ?? createLogger();
    this.clock = options.clock ?? Date.now;
  }

  recompute(agentId: string): BaselineStats {
    const runIds = this.store.runIds(agentId, this.requiredRuns);

    if (runIds.length === 0) {
      const baseline = emptyBaseline(agentId, this.clock());
      this.store.putBaseline(baseline);
      return baseline;
    }

    const tokens: number[] = [];
    const tools: number[] = [];
    const durations: number[] = [];
    const sequences: string[][] = [];
    const goalMeans: number[] = [];

    for (const runId of runIds) {
      const stats = this.store.runAggregates(agentId, runId);
      tokens.push(stats.total_tokens);
      tools.push(stats.tool_calls);
      durations.push(stats.total_duration_ms);

      const actions = this.store.recentActionNames(agentId, runId, SEQUENCE_WINDOW);
      if (actions.length > 0) sequences.push(actions);

      const similarities = this.store.goalSimilarities(agentId, runId);
      if (similarities.length > 0) goalMeans.push(mean(similarities));
    }

    const isCalibrated = runIds.length >= this.requiredRuns;
    const baseline: BaselineStats = {
      agent_id: agentId,
      calibration_runs: runIds.length,
      mean_tokens_per_run: mean(tokens),
      std_tokens_per_run: populationStd(tokens),
      mean_tools_per_run: mean(tools),
      std_tools_per_run: populationStd(tools),
      mean_duration_ms: mean(durations),
      std_duration_ms: populationStd(durations),
      common_sequences: findCommonSequences(sequences),
      mean_goal_similarity: mean(goalMeans),
      std_goal_similarity: populationStd(goalMeans),
      is_calibrated: isCalibrated,
      updated_at: this.clock(),
    };

    this.store.putBaseline(baseline);

    if (isCalibrated) {
      this.logger.info('Baseline calibrated', {
        agent_id: agentId,
        runs: baseline.calibration_runs,
        mean_tokens: Math.round(baseline.mean_tokens_per_run),
        mean_tools: Number(baseline.mean_tools_per_run.toFixed(1)),
      });
    } else {
      this.logger.info('Baseline partial', {
        agent_id: agentId,
        runs: `${baseline.calibration_runs}/${this.requiredRuns}`,
      });
    }

    return baseline;
  }
}
