import type { BaselineStats, DriftIncident, TraceEvent } from '../models/types.js';
import { BaseDetector } from './base.js';

export interface ResourceSpikeOptions {
  spikeMultiplier?: number;
  absoluteTokenLimit?: number;
  absoluteDurationLimitMs?: number;
  /** Wall clock for run start/elapsed time, epoch ms. */
  clock?: () => number;
  enabled?: boolean;
}

export interface RunCounter {
  total_tokens: number;
  total_duration_ms: number;
  tool_calls: number;
  model_requests: number;
  start_time: number;
}

const MAX_TRACKED_RUNS = 10;

interface MetricCheck {
  metric: 'token_burn' | 'duration' | 'tool_calls';
  current: number;
  mean: number;
  std: number;
  unit: string;
}

/**
 * Flags abnormal consumption within a run: token burn, summed action
 * duration, or tool-call count exceeding the baseline by `spikeMultiplier`
 * deviations, plus absolute token and wall-time limits that apply with or
 * without a baseline.
 *
 * Run counters live in this process only. At most ten runs are tracked; the
 * earliest-created one is dropped when an eleventh appears.
 */
export class ResourceSpikeDetector extends BaseDetector {
  readonly kind = 'resource_spike' as const;
  readonly spikeMultiplier: number;
  readonly absoluteTokenLimit: number;
  readonly absoluteDurationLimitMs: number;
  private clock: () => number;
  private counters = new Map<string, RunCounter>();

  constructor(options: ResourceSpikeOptions = {}) {
    super(options.enabled ?? true);
    this.spikeMultiplier = options.spikeMultiplier ?? 2.5;
    this.absoluteTokenLimit = options.absoluteTokenLimit ?? 50_000;
    this.absoluteDurationLimitMs = options.absoluteDurationLimitMs ?? 300_000;
    this.clock = options.clock ?? Date.now;
  }

  /** Snapshot of a tracked run's totals. */
  runCounter(runId: string): RunCounter | undefined {
    const counter = this.counters.get(runId);
    return counter ? { ...counter } : undefined;
  }

  get trackedRuns(): string[] {
    return [...this.counters.keys()];
  }

  releaseRun(runId: string): void {
    this.counters.delete(runId);
  }

  protected evaluate(event: TraceEvent, baseline: BaselineStats | null): DriftIncident | null {
    const counter = this.counterFor(event.run_id);
    counter.total_tokens += event.token_count;
    counter.total_duration_ms += event.duration_ms;
    if (event.action_type === 'tool_call') {
      counter.tool_calls++;
    } else if (event.action_type === 'model_request') {
      counter.model_requests++;
    }

    if (baseline?.is_calibrated) {
      const spike = this.checkBaselineSpike(event, baseline, counter);
      if (spike) return spike;
    }
    return this.checkAbsoluteLimits(event, counter);
  }

  private counterFor(runId: string): RunCounter {
    let counter = this.counters.get(runId);
    if (!counter) {
      counter = { total_tokens: 0, total_duration_ms: 0, tool_calls: 0, model_requests: 0, start_time: this.clock() };
      this.counters.set(runId, counter);
      if (this.counters.size > MAX_TRACKED_RUNS) {
        const oldest = this.counters.keys().next();
        if (!oldest.done) this.counters.delete(oldest.value);
      }
    }
    return counter;
  }

  private checkBaselineSpike(event: TraceEvent, baseline: BaselineStats, counter: RunCounter): DriftIncident | null {
    const checks: MetricCheck[] = [
      {
        metric: 'token_burn',
        current: counter.total_tokens,
        mean: baseline.mean_tokens_per_run,
        std: baseline.std_tokens_per_run,
        unit: 'tokens',
      },
      {
        metric: 'duration',
        current: counter.total_duration_ms,
        mean: baseline.mean_duration_ms,
        std: baseline.std_duration_ms,
        unit: 'ms',
      },
      {
        metric: 'tool_calls',
        current: counter.tool_calls,
        mean: baseline.mean_tools_per_run,
        std: baseline.std_tools_per_run,
        unit: 'calls',
      },
    ];

    for (const { metric, current, mean, std, unit } of checks) {
      if (mean === 0 && std === 0) continue;

      const threshold = mean + this.spikeMultiplier * Math.max(std, mean * 0.1);
      if (current > threshold && current > mean * 1.5) {
        return this.createIncident(event, {
          score: Math.min(1, (current - threshold) / Math.max(threshold, 1)),
          message:
            `Resource spike: ${metric} at ${current.toFixed(0)} ${unit} ` +
            `(baseline: ${mean.toFixed(0)} ± ${std.toFixed(0)})`,
          suggested_action: `Check for malformed input or error loops causing elevated ${metric}`,
          context: {
            metric,
            current,
            baseline_mean: mean,
            baseline_std: std,
            threshold,
            run_totals: { ...counter },
          },
        });
      }
    }
    return null;
  }

  private checkAbsoluteLimits(event: TraceEvent, counter: RunCounter): DriftIncident | null {
    if (counter.total_tokens > this.absoluteTokenLimit) {
      const overage = (counter.total_tokens - this.absoluteTokenLimit) / this.absoluteTokenLimit;
      return this.createIncident(event, {
        score: Math.max(Math.min(1, overage), 0.7),
        message:
          `Resource spike: token count ${counter.total_tokens.toLocaleString('en-US')} ` +
          `exceeds absolute limit (${this.absoluteTokenLimit.toLocaleString('en-US')})`,
        suggested_action: 'Investigate agent run: token consumption is abnormally high',
        context: {
          metric: 'absolute_token_limit',
          current_tokens: counter.total_tokens,
          limit: this.absoluteTokenLimit,
        },
      });
    }

    const elapsed = this.clock() - counter.start_time;
    if (elapsed > this.absoluteDurationLimitMs) {
      return this.createIncident(event, {
        score: 0.8,
        severity: 'HIGH',
        message:
          `Resource spike: run duration ${(elapsed / 1000).toFixed(1)}s ` +
          `exceeds limit (${(this.absoluteDurationLimitMs / 1000).toFixed(0)}s)`,
        suggested_action: 'Agent may be hung or stuck; consider terminating the run',
        context: {
          metric: 'absolute_duration_limit',
          elapsed_ms: elapsed,
          limit_ms: this.absoluteDurationLimitMs,
        },
      });
    }

    return null;
  }
}
