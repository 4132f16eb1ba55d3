import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { DriftMonitor, type DriftMonitorOptions } from '../src/services/monitor.js';
import { EventStore } from '../src/services/event-store.js';
import { InvalidEventError, StoreError } from '../src/models/errors.js';
import { MemorySink, StructuredLogger } from '../src/utils/logger.js';
import type { DriftIncident } from '../src/models/types.js';

let db: Database.Database;
let store: EventStore;
let sink: MemorySink;

function makeMonitor(options: Partial<DriftMonitorOptions> = {}): DriftMonitor {
  return new DriftMonitor({
    agentId: 'bot',
    store,
    logger: new StructuredLogger({ level: 'debug', sinks: [sink] }),
    ...options,
  });
}

beforeEach(() => {
  db = new Database(':memory:');
  store = new EventStore(db);
  sink = new MemorySink();
});

afterEach(() => {
  db.close();
});

describe('DriftMonitor recording', () => {
  it('records a clean run without incidents', async () => {
    const monitor = makeMonitor();
    const runId = monitor.startRun();
    const incidents: DriftIncident[] = [];
    incidents.push(...(await monitor.recordEvent({ action_type: 'model_request', action_name: 'plan', token_count: 200 })));
    incidents.push(...(await monitor.recordEvent({ action_type: 'tool_call', action_name: 'lookup', token_count: 20 })));
    incidents.push(...(await monitor.recordEvent({ action_type: 'tool_call', action_name: 'refund', token_count: 20 })));
    monitor.endRun(runId);

    expect(incidents).toEqual([]);
    expect(store.runEvents('bot', runId).map((e) => e.action_name)).toEqual(['plan', 'lookup', 'refund']);
    expect(store.incidents()).toEqual([]);
  });

  it('fills defaults and copies payloads', async () => {
    const monitor = makeMonitor();
    const input = { action_type: 'tool_call', action_name: 'x', input_data: { q: 1 } };
    await monitor.recordEvent({ ...input, run_id: 'r1' });
    const [event] = store.runEvents('bot', 'r1');
    expect(event.token_count).toBe(0);
    expect(event.duration_ms).toBe(0);
    expect(event.input_data).toEqual({ q: 1 });
    expect(event.output_data).toEqual({});
    expect(event.id).toMatch(/^evt_/);
  });

  it('rejects invalid input without storing it', async () => {
    const monitor = makeMonitor();
    await expect(monitor.recordEvent({ action_type: 'thought', action_name: 'x' })).rejects.toBeInstanceOf(
      InvalidEventError,
    );
    await expect(monitor.recordEvent({ action_type: 'tool_call', action_name: '', token_count: -1 })).rejects.toThrow(
      'Invalid event: action_name: action_name is required and must be a string; token_count: token_count must be a non-negative finite number',
    );
    expect(store.events()).toEqual([]);
  });

  it('starts a run implicitly', async () => {
    const monitor = makeMonitor();
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    const runId = monitor.activeRunId;
    expect(runId).toMatch(/^run_/);
    expect(runId && monitor.runState(runId)).toBe('running');
  });

  it('surfaces persistence failures', async () => {
    const monitor = makeMonitor({ store: undefined, dbPath: ':memory:' });
    monitor.close();
    await expect(monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' })).rejects.toBeInstanceOf(StoreError);
  });
});

describe('DriftMonitor detection', () => {
  it('reports loop and spike incidents in detector order', async () => {
    const monitor = makeMonitor({ loopMaxRepeats: 3, absoluteTokenLimit: 250 });
    monitor.startRun('r1');
    const all: DriftIncident[][] = [];
    for (let i = 0; i < 3; i++) {
      all.push(await monitor.recordEvent({ action_type: 'tool_call', action_name: 'search_db', token_count: 100 }));
    }

    expect(all[0]).toEqual([]);
    expect(all[1]).toEqual([]);
    expect(all[2].map((i) => i.detector)).toEqual(['action_loop', 'resource_spike']);
    expect(store.incidents().map((i) => i.id).sort()).toEqual(all[2].map((i) => i.id).sort());
  });

  it('fires the absolute token limit by the sixth event', async () => {
    const monitor = makeMonitor({ absoluteTokenLimit: 500 });
    monitor.startRun('r1');
    const incidents: DriftIncident[] = [];
    for (let i = 0; i < 6; i++) {
      incidents.push(
        ...(await monitor.recordEvent({ action_type: 'model_request', action_name: `step_${i}`, token_count: 100 })),
      );
    }
    expect(incidents).toHaveLength(1);
    expect(incidents[0].detector).toBe('resource_spike');
    expect(incidents[0].score).toBeGreaterThanOrEqual(0.7);
  });

  it('honours per-detector switches', async () => {
    const monitor = makeMonitor({ loopMaxRepeats: 2, detectors: { action_loop: false } });
    monitor.startRun('r1');
    for (let i = 0; i < 4; i++) {
      expect(await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' })).toEqual([]);
    }
  });

  it('isolates a failing detector', async () => {
    const monitor = makeMonitor({ loopMaxRepeats: 2 });
    monitor.resourceSpike.check = async () => {
      throw new Error('boom');
    };
    monitor.startRun('r1');
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    const incidents = await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });

    expect(incidents.map((i) => i.detector)).toEqual(['action_loop']);
    const failure = sink.getEntries().find((e) => e.message === 'Detector failed');
    expect(failure?.data).toMatchObject({ detector: 'resource_spike', run_id: 'r1', error: 'boom' });
  });

  it('logs each incident at warn level', async () => {
    const monitor = makeMonitor({ loopMaxRepeats: 2 });
    monitor.startRun('r1');
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    const warnings = sink.getEntries({ level: 'warn' });
    expect(warnings.map((e) => e.message)).toEqual(['DRIFT [MEDIUM] action_loop: Action loop: x called 2x consecutively']);
  });

  it('persists goal similarities for calibration', async () => {
    const monitor = makeMonitor({
      goalDescription: 'refund the order',
      embed: () => [1, 0],
    });
    monitor.startRun('r1');
    await monitor.recordEvent({
      action_type: 'model_request',
      action_name: 'respond',
      output_data: { text: 'Your refund has been processed today.' },
    });
    expect(store.goalSimilarities('bot', 'r1')).toEqual([1]);
  });

  it('treats a broken embedding as no drift on this and later events', async () => {
    const monitor = makeMonitor({
      goalDescription: 'refund the order',
      embed: (text) => (text === 'refund the order' ? [1, 0] : [Number.NaN, 0]),
    });
    monitor.startRun('r1');

    const first = await monitor.recordEvent({
      action_type: 'model_request',
      action_name: 'respond',
      output_data: { text: 'Here is a short poem about the ocean at night.' },
    });
    const second = await monitor.recordEvent({ action_type: 'tool_call', action_name: 'lookup' });

    expect(first).toEqual([]);
    expect(second).toEqual([]);
    expect(store.incidents()).toEqual([]);
    expect(store.goalSimilarities('bot', 'r1')).toEqual([]);
    expect(sink.getEntries({ level: 'warn' }).map((e) => e.message)).toEqual(['Goal drift check failed']);
  });

  it('does not carry a goal sample over from a failed event', async () => {
    const monitor = makeMonitor({
      goalDescription: 'refund the order',
      embed: (text) => (text.includes('poem') ? [0, 1] : [1, 0]),
    });
    monitor.startRun('r1');
    vi.spyOn(store, 'appendIncident').mockImplementationOnce(() => {
      throw new StoreError('appendIncident failed: disk full', 'appendIncident');
    });

    await expect(
      monitor.recordEvent({
        action_type: 'model_request',
        action_name: 'respond',
        output_data: { text: 'Here is a short poem about the ocean at night.' },
      }),
    ).rejects.toThrow('appendIncident failed: disk full');

    expect(await monitor.recordEvent({ action_type: 'tool_call', action_name: 'lookup' })).toEqual([]);
    expect(store.goalSimilarities('bot', 'r1')).toEqual([]);
  });
});

describe('DriftMonitor callbacks', () => {
  it('delivers incidents to subscribers until they unsubscribe', async () => {
    const monitor = makeMonitor({ loopMaxRepeats: 2 });
    const callback = vi.fn();
    const unsubscribe = monitor.onDrift(callback);
    monitor.startRun('r1');

    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    expect(callback).toHaveBeenCalledTimes(1);

    unsubscribe();
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('keeps going when a callback throws', async () => {
    const monitor = makeMonitor({ loopMaxRepeats: 2 });
    const second = vi.fn();
    monitor.onDrift(() => {
      throw new Error('webhook down');
    });
    monitor.onDrift(second);
    monitor.startRun('r1');

    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    const incidents = await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });

    expect(incidents).toHaveLength(1);
    expect(second).toHaveBeenCalledWith(incidents[0]);
    expect(sink.getEntries().some((e) => e.message === 'Drift callback failed')).toBe(true);
  });

  it('awaits async callbacks before returning', async () => {
    const monitor = makeMonitor({ loopMaxRepeats: 2 });
    const seen: string[] = [];
    monitor.onDrift(async (incident) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      seen.push(incident.id);
    });
    monitor.startRun('r1');
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    const [incident] = await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    expect(seen).toEqual([incident.id]);
  });
});

describe('DriftMonitor runs and baselines', () => {
  it('calibrates from the configured number of runs', async () => {
    const monitor = makeMonitor({ calibrationRuns: 5 });
    for (let run = 0; run < 6; run++) {
      const runId = monitor.startRun();
      for (let i = 0; i < 3; i++) {
        await monitor.recordEvent({ action_type: 'tool_call', action_name: `step_${i}`, token_count: 100 });
      }
      monitor.endRun(runId);
    }

    const baseline = monitor.getBaseline();
    expect(baseline?.is_calibrated).toBe(true);
    expect(baseline?.calibration_runs).toBe(5);
    expect(baseline?.mean_tokens_per_run).toBe(300);
    expect(baseline?.mean_tools_per_run).toBe(3);
    expect(baseline?.std_tools_per_run).toBe(0);
    expect(store.getBaseline('bot')).toEqual(baseline);
  });

  it('loads a stored baseline on construction', async () => {
    const first = makeMonitor({ calibrationRuns: 1 });
    const runId = first.startRun();
    await first.recordEvent({ action_type: 'tool_call', action_name: 'x', token_count: 10 });
    first.endRun(runId);

    expect(makeMonitor().getBaseline()?.mean_tokens_per_run).toBe(10);
  });

  it('moves runs through idle, running and ended', async () => {
    const monitor = makeMonitor();
    expect(monitor.runState('r1')).toBe('idle');
    monitor.startRun('r1');
    expect(monitor.runState('r1')).toBe('running');
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    monitor.endRun();
    expect(monitor.runState('r1')).toBe('ended');
    expect(monitor.activeRunId).toBeNull();
    expect(monitor.resourceSpike.trackedRuns).toEqual([]);
  });

  it('returns the cached baseline when there is no run to end', () => {
    const monitor = makeMonitor();
    expect(monitor.endRun()).toBeNull();
  });

  it('track() runs a task as one run', async () => {
    const monitor = makeMonitor();
    const result = await monitor.track(async (runId) => {
      await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x', run_id: runId });
      return runId;
    });
    expect(monitor.runState(result)).toBe('ended');
    expect(monitor.getBaseline()?.calibration_runs).toBe(1);
  });

  it('track() records a failure and rethrows', async () => {
    const monitor = makeMonitor();
    let seenRun = '';
    await expect(
      monitor.track(
        (runId) => {
          seenRun = runId;
          throw new Error('tool crashed');
        },
        { runId: 'r-fail' },
      ),
    ).rejects.toThrow('tool crashed');

    const [event] = store.runEvents('bot', 'r-fail');
    expect(seenRun).toBe('r-fail');
    expect(event.action_type).toBe('state_transition');
    expect(event.action_name).toBe('run_error');
    expect(event.output_data).toEqual({ error: 'tool crashed' });
    expect(monitor.runState('r-fail')).toBe('ended');
  });

  it('keeps the task error when the run cannot be recorded', async () => {
    const monitor = makeMonitor({ store: undefined, dbPath: ':memory:' });
    await expect(
      monitor.track(() => {
        monitor.close();
        throw new Error('tool crashed');
      }),
    ).rejects.toThrow('tool crashed');

    expect(sink.getEntries({ level: 'error' }).map((e) => e.message)).toEqual([
      'Failed to record run error',
      'Failed to end run',
    ]);
  });

  it('measures the recent-incident window with its clock', async () => {
    const later = Date.now() + 2 * 3_600_000;
    const monitor = makeMonitor({ loopMaxRepeats: 2, clock: () => later });
    monitor.startRun('r1');
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });

    expect(monitor.recentIncidents({ hours: 1 })).toEqual([]);
    expect(monitor.recentIncidents({ hours: 3 })).toHaveLength(1);
  });

  it('lists recent incidents for its agent only', async () => {
    const monitor = makeMonitor({ loopMaxRepeats: 2 });
    monitor.startRun('r1');
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    await monitor.recordEvent({ action_type: 'tool_call', action_name: 'x' });
    store.appendIncident({
      id: 'inc_other',
      agent_id: 'other',
      run_id: 'r9',
      detector: 'goal_drift',
      severity: 'LOW',
      score: 0.1,
      message: 'm',
      suggested_action: 's',
      timestamp: Date.now(),
      context: {},
    });

    const recent = monitor.recentIncidents({ hours: 1 });
    expect(recent).toHaveLength(1);
    expect(recent[0].agent_id).toBe('bot');
  });

  it('setGoal replaces the goal used for drift checks', () => {
    const monitor = makeMonitor({ goalDescription: 'first' });
    monitor.setGoal('second');
    expect(monitor.goalDrift.goalDescription).toBe('second');
    monitor.startRun('r1', 'third');
    expect(monitor.goalDrift.goalDescription).toBe('third');
  });
});
