import { describe, it, expect } from 'vitest';
import { ResourceSpikeDetector } from '../src/detectors/resource-spike.js';
import { emptyBaseline } from '../src/models/codec.js';
import type { BaselineStats, DriftIncident, TraceEvent } from '../src/models/types.js';

function makeEvent(overrides: Partial<TraceEvent> = {}): TraceEvent {
  return {
    id: 'evt_1',
    agent_id: 'bot',
    run_id: 'run-1',
    action_type: 'model_request',
    action_name: 'plan',
    timestamp: 1,
    token_count: 0,
    duration_ms: 0,
    input_data: {},
    output_data: {},
    metadata: {},
    ...overrides,
  };
}

function calibrated(overrides: Partial<BaselineStats> = {}): BaselineStats {
  return { ...emptyBaseline('bot'), calibration_runs: 30, is_calibrated: true, ...overrides };
}

describe('ResourceSpikeDetector baseline checks', () => {
  it('flags token burn beyond mean + multiplier * std', async () => {
    const detector = new ResourceSpikeDetector({ spikeMultiplier: 2 });
    const baseline = calibrated({ mean_tokens_per_run: 200, std_tokens_per_run: 50 });
    const incident = await detector.check(makeEvent({ token_count: 400 }), baseline);

    expect(incident?.detector).toBe('resource_spike');
    expect(incident?.message).toBe('Resource spike: token_burn at 400 tokens (baseline: 200 ± 50)');
    expect(incident?.score).toBeCloseTo(1 / 3, 10);
    expect(incident?.severity).toBe('LOW');
    expect(incident?.context.metric).toBe('token_burn');
    expect(incident?.context.threshold).toBe(300);
  });

  it('stays quiet at the threshold', async () => {
    const detector = new ResourceSpikeDetector({ spikeMultiplier: 2 });
    const baseline = calibrated({ mean_tokens_per_run: 200, std_tokens_per_run: 50 });
    expect(await detector.check(makeEvent({ token_count: 300 }), baseline)).toBeNull();
  });

  it('uses ten percent of the mean as a floor for std', async () => {
    const detector = new ResourceSpikeDetector({ spikeMultiplier: 2.5 });
    const baseline = calibrated({ mean_tools_per_run: 3, std_tools_per_run: 0 });
    const results: Array<DriftIncident | null> = [];
    for (let i = 0; i < 5; i++) {
      results.push(await detector.check(makeEvent({ action_type: 'tool_call', action_name: 'search' }), baseline));
    }
    // threshold 3.75 and 1.5x mean 4.5: only the fifth call qualifies
    expect(results.slice(0, 4)).toEqual([null, null, null, null]);
    expect(results[4]?.message).toBe('Resource spike: tool_calls at 5 calls (baseline: 3 ± 0)');
    expect(results[4]?.score).toBeCloseTo(1.25 / 3.75, 10);
  });

  it('flags summed action duration', async () => {
    const detector = new ResourceSpikeDetector();
    const baseline = calibrated({ mean_duration_ms: 1_000, std_duration_ms: 100 });
    const incident = await detector.check(makeEvent({ duration_ms: 4_000 }), baseline);
    expect(incident?.message).toBe('Resource spike: duration at 4000 ms (baseline: 1000 ± 100)');
  });

  it('ignores the baseline until it is calibrated', async () => {
    const detector = new ResourceSpikeDetector({ spikeMultiplier: 2 });
    const partial = { ...calibrated({ mean_tokens_per_run: 200, std_tokens_per_run: 50 }), is_calibrated: false };
    expect(await detector.check(makeEvent({ token_count: 5_000 }), partial)).toBeNull();
  });

  it('accumulates per run', async () => {
    const detector = new ResourceSpikeDetector();
    await detector.check(makeEvent({ token_count: 10, duration_ms: 5 }), null);
    await detector.check(makeEvent({ action_type: 'tool_call', token_count: 20 }), null);
    await detector.check(makeEvent({ run_id: 'run-2', token_count: 99 }), null);

    expect(detector.runCounter('run-1')).toMatchObject({
      total_tokens: 30,
      total_duration_ms: 5,
      tool_calls: 1,
      model_requests: 1,
    });
    expect(detector.runCounter('run-2')?.total_tokens).toBe(99);
  });
});

describe('ResourceSpikeDetector absolute limits', () => {
  it('flags the run that crosses the token limit without a baseline', async () => {
    const detector = new ResourceSpikeDetector({ absoluteTokenLimit: 500 });
    const results: Array<DriftIncident | null> = [];
    for (let i = 0; i < 6; i++) {
      results.push(await detector.check(makeEvent({ token_count: 100 }), null));
    }

    expect(results.slice(0, 5).every((r) => r === null)).toBe(true);
    const incident = results[5];
    expect(incident?.score).toBe(0.7);
    expect(incident?.severity).toBe('HIGH');
    expect(incident?.message).toBe('Resource spike: token count 600 exceeds absolute limit (500)');
  });

  it('caps the absolute token score at 1', async () => {
    const detector = new ResourceSpikeDetector();
    const incident = await detector.check(makeEvent({ token_count: 200_000 }), null);
    expect(incident?.score).toBe(1);
    expect(incident?.severity).toBe('CRITICAL');
    expect(incident?.message).toBe('Resource spike: token count 200,000 exceeds absolute limit (50,000)');
  });

  it('flags a run open longer than the duration limit', async () => {
    let now = 0;
    const detector = new ResourceSpikeDetector({ clock: () => now });
    expect(await detector.check(makeEvent(), null)).toBeNull();

    now = 301_000;
    const incident = await detector.check(makeEvent(), null);
    expect(incident?.score).toBe(0.8);
    expect(incident?.severity).toBe('HIGH');
    expect(incident?.message).toBe('Resource spike: run duration 301.0s exceeds limit (300s)');
    expect(incident?.context).toEqual({
      metric: 'absolute_duration_limit',
      elapsed_ms: 301_000,
      limit_ms: 300_000,
    });
  });
});

describe('ResourceSpikeDetector run tracking', () => {
  it('tracks at most ten runs, dropping the earliest', async () => {
    const detector = new ResourceSpikeDetector();
    for (let i = 1; i <= 11; i++) {
      await detector.check(makeEvent({ run_id: `run-${i}` }), null);
    }
    expect(detector.trackedRuns).toHaveLength(10);
    expect(detector.trackedRuns[0]).toBe('run-2');
    expect(detector.runCounter('run-1')).toBeUndefined();
  });

  it('releases a finished run', async () => {
    const detector = new ResourceSpikeDetector();
    await detector.check(makeEvent(), null);
    detector.releaseRun('run-1');
    expect(detector.trackedRuns).toEqual([]);
  });

  it('hands out copies of its counters', async () => {
    const detector = new ResourceSpikeDetector();
    await detector.check(makeEvent({ token_count: 5 }), null);
    const snapshot = detector.runCounter('run-1');
    if (snapshot) snapshot.total_tokens = 1_000;
    expect(detector.runCounter('run-1')?.total_tokens).toBe(5);
  });

  it('does not count events while disabled', async () => {
    const detector = new ResourceSpikeDetector({ enabled: false, absoluteTokenLimit: 1 });
    expect(await detector.check(makeEvent({ token_count: 100 }), null)).toBeNull();
    expect(detector.trackedRuns).toEqual([]);
  });
});
