import type { DetectorType, RunState } from '../models/enums.js';
import type { BaselineStats, DriftIncident, GoalSample, RecordEventInput, TraceEvent } from '../models/types.js';
import { InvalidEventError } from '../models/errors.js';
import {
  ActionLoopDetector,
  GoalDriftDetector,
  ResourceSpikeDetector,
  type BaseDetector,
  type EmbedFunction,
} from '../detectors/index.js';
import { BaselineCalibrator } from './calibrator.js';
import { EventStore } from './event-store.js';
import { generateId } from '../utils/id.js';
import { errorMessage } from '../utils/json.js';
import { createLogger, type StructuredLogger } from '../utils/logger.js';
import { monotonicNow } from '../utils/time.js';
import { isValidActionType, validateEventInput } from '../utils/validators.js';

export type DriftCallback = (incident: DriftIncident) => void | Promise<void>;

export interface DriftMonitorOptions {
  agentId: string;
  /** Shared store; when omitted the monitor opens (and owns) one at `dbPath`. */
  store?: EventStore;
  dbPath?: string;
  goalDescription?: string;
  calibrationRuns?: number;
  loopWindow?: number;
  loopMaxRepeats?: number;
  loopSequenceLength?: number;
  similarityThreshold?: number;
  spikeMultiplier?: number;
  absoluteTokenLimit?: number;
  absoluteDurationLimitMs?: number;
  embed?: EmbedFunction;
  embedTimeoutMs?: number;
  /** Per-detector switches; every detector is enabled unless set to false. */
  detectors?: Partial<Record<DetectorType, boolean>>;
  logger?: StructuredLogger;
  /** Wall clock for run timing and baseline timestamps. */
  clock?: () => number;
}

export interface RecentIncidentOptions {
  hours?: number;
  limit?: number;
}

export interface TrackOptions {
  runId?: string;
  goal?: string;
}

/**
 * In-process drift monitor for one agent.
 *
 *   const monitor = new DriftMonitor({ agentId: 'support-bot', calibrationRuns: 30 });
 *   monitor.onDrift((incident) => console.log(incident.message));
 *
 *   const runId = monitor.startRun(undefined, 'Resolve the customer refund request');
 *   await monitor.recordEvent({ action_type: 'tool_call', action_name: 'search_db', token_count: 120 });
 *   monitor.endRun(runId);
 *
 * Every event is persisted before any detector sees it. Detectors run in a
 * fixed order (action loop, goal drift, resource spike) against the cached
 * baseline, which is refreshed only when a run ends or on `recalibrate()`.
 */
export class DriftMonitor {
  readonly agentId: string;
  readonly store: EventStore;
  readonly calibrator: BaselineCalibrator;
  readonly actionLoop: ActionLoopDetector;
  readonly goalDrift: GoalDriftDetector;
  readonly resourceSpike: ResourceSpikeDetector;

  private ownsStore: boolean;
  private logger: StructuredLogger;
  private detectors: BaseDetector[];
  private baseline: BaselineStats | null;
  private callbacks: DriftCallback[] = [];
  private runStates = new Map<string, RunState>();
  private currentRunId: string | null = null;
  private clock: () => number;
  /** Goal samples keyed by the event that produced them, held only while that event is checked. */
  private goalSamples = new Map<string, GoalSample>();

  constructor(options: DriftMonitorOptions) {
    this.agentId = options.agentId;
    this.ownsStore = options.store == null;
    this.store = options.store ?? EventStore.open(options.dbPath);
    this.logger = (options.logger ?? createLogger()).withContext({ agent_id: options.agentId });
    this.clock = options.clock ?? Date.now;

    const enabled = options.detectors ?? {};
    this.calibrator = new BaselineCalibrator(this.store, {
      requiredRuns: options.calibrationRuns,
      logger: this.logger,
      clock: options.clock,
    });
    this.actionLoop = new ActionLoopDetector(this.store, {
      windowSize: options.loopWindow,
      maxRepeats: options.loopMaxRepeats,
      sequenceLength: options.loopSequenceLength,
      enabled: enabled.action_loop ?? true,
    });
    this.goalDrift = new GoalDriftDetector({
      embed: options.embed,
      goalDescription: options.goalDescription,
      similarityThreshold: options.similarityThreshold,
      embedTimeoutMs: options.embedTimeoutMs,
      onSimilarity: (event, similarity) => {
        this.goalSamples.set(event.id, {
          event_id: event.id,
          agent_id: event.agent_id,
          run_id: event.run_id,
          similarity,
          timestamp: event.timestamp,
        });
      },
      logger: this.logger,
      enabled: enabled.goal_drift ?? true,
    });
    this.resourceSpike = new ResourceSpikeDetector({
      spikeMultiplier: options.spikeMultiplier,
      absoluteTokenLimit: options.absoluteTokenLimit,
      absoluteDurationLimitMs: options.absoluteDurationLimitMs,
      clock: options.clock,
      enabled: enabled.resource_spike ?? true,
    });
    this.detectors = [this.actionLoop, this.goalDrift, this.resourceSpike];

    this.baseline = this.store.getBaseline(this.agentId);
    this.logger.debug('DriftMonitor initialised', {
      baseline: this.baseline?.is_calibrated ? 'calibrated' : 'pending',
    });
  }

  // ── Run lifecycle ─────────────────────────────────────────────────────

  get activeRunId(): string | null {
    return this.currentRunId;
  }

  runState(runId: string): RunState {
    return this.runStates.get(runId) ?? 'idle';
  }

  /** Begin a run, optionally replacing the goal used for drift checks. */
  startRun(runId?: string, goal?: string): string {
    const id = runId ?? generateId('run');
    if (goal) this.goalDrift.setGoal(goal);
    this.runStates.set(id, 'running');
    this.currentRunId = id;
    this.logger.debug('Run started', { run_id: id });
    return id;
  }

  /**
   * End a run and recompute the baseline from stored history.
   * Without an id (and no active run) nothing is recomputed.
   */
  endRun(runId?: string): BaselineStats | null {
    const id = runId ?? this.currentRunId;
    if (!id) return this.baseline;

    const baseline = this.recalibrate();
    this.runStates.set(id, 'ended');
    this.resourceSpike.releaseRun(id);
    if (this.currentRunId === id) this.currentRunId = null;
    this.logger.debug('Run ended', { run_id: id, calibrated: baseline.is_calibrated });
    return baseline;
  }

  /**
   * Run `task` as one monitored run. A thrown error is recorded as a
   * `run_error` state transition and rethrown; the run always ends.
   * Failures while recording or ending a failed run are logged so the
   * task's own error is what the caller sees.
   */
  async track<T>(task: (runId: string) => T | Promise<T>, options: TrackOptions = {}): Promise<T> {
    const runId = this.startRun(options.runId, options.goal);
    let result: T;
    try {
      result = await task(runId);
    } catch (err) {
      await this.failRun(runId, err);
      throw err;
    }
    this.endRun(runId);
    return result;
  }

  // ── Events ────────────────────────────────────────────────────────────

  /**
   * Persist one event and run it through every detector.
   * Returns the incidents this event produced, in detector order.
   */
  async recordEvent(input: RecordEventInput): Promise<DriftIncident[]> {
    const validation = validateEventInput(input);
    const actionType = input.action_type;
    if (!validation.valid || !isValidActionType(actionType)) {
      const summary = validation.errors.map((e) => `${e.field}: ${e.message}`).join('; ');
      throw new InvalidEventError(`Invalid event: ${summary}`, validation.errors);
    }

    const runId = input.run_id ?? this.currentRunId ?? this.startRun();
    if (this.runStates.get(runId) !== 'running') {
      this.runStates.set(runId, 'running');
    }

    const event: TraceEvent = {
      id: generateId('evt'),
      agent_id: this.agentId,
      run_id: runId,
      action_type: actionType,
      action_name: input.action_name,
      timestamp: monotonicNow(),
      token_count: input.token_count ?? 0,
      duration_ms: input.duration_ms ?? 0,
      input_data: { ...input.input_data },
      output_data: { ...input.output_data },
      metadata: { ...input.metadata },
    };
    this.store.append(event);

    const incidents: DriftIncident[] = [];
    try {
      for (const detector of this.detectors) {
        let incident: DriftIncident | null;
        try {
          incident = await detector.check(event, this.baseline);
        } catch (err) {
          this.logger.error('Detector failed', {
            detector: detector.kind,
            run_id: runId,
            error: errorMessage(err),
          });
          continue;
        }
        if (!incident) continue;

        this.store.appendIncident(incident);
        incidents.push(incident);
        this.logger.warn(`DRIFT [${incident.severity}] ${incident.detector}: ${incident.message}`, {
          run_id: runId,
          score: incident.score,
        });
        await this.dispatch(incident);
      }

      const sample = this.goalSamples.get(event.id);
      if (sample) this.store.appendGoalSample(sample);
    } finally {
      this.goalSamples.delete(event.id);
    }
    return incidents;
  }

  /** Register an incident callback. Returns a function that unregisters it. */
  onDrift(callback: DriftCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      this.callbacks = this.callbacks.filter((cb) => cb !== callback);
    };
  }

  // ── Baseline & history ────────────────────────────────────────────────

  getBaseline(): BaselineStats | null {
    return this.baseline;
  }

  recalibrate(): BaselineStats {
    this.baseline = this.calibrator.recompute(this.agentId);
    return this.baseline;
  }

  setGoal(goal: string): void {
    this.goalDrift.setGoal(goal);
  }

  recentIncidents(options: RecentIncidentOptions = {}): DriftIncident[] {
    const hours = options.hours ?? 24;
    return this.store.incidents({
      agent_id: this.agentId,
      since: this.clock() - hours * 3_600_000,
      limit: options.limit ?? 50,
    });
  }

  close(): void {
    if (this.ownsStore) this.store.close();
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private async failRun(runId: string, err: unknown): Promise<void> {
    try {
      await this.recordEvent({
        action_type: 'state_transition',
        action_name: 'run_error',
        run_id: runId,
        output_data: { error: errorMessage(err) },
      });
    } catch (recordErr) {
      this.logger.error('Failed to record run error', { run_id: runId, error: errorMessage(recordErr) });
    }
    try {
      this.endRun(runId);
    } catch (endErr) {
      this.logger.error('Failed to end run', { run_id: runId, error: errorMessage(endErr) });
    }
  }

  private async dispatch(incident: DriftIncident): Promise<void> {
    for (const callback of [...this.callbacks]) {
      try {
        await callback(incident);
      } catch (err) {
        this.logger.warn('Drift callback failed', {
          incident_id: incident.id,
          error: errorMessage(err),
        });
      }
    }
  }
}
