import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { EventStore } from '../src/services/event-store.js';
import { emptyBaseline } from '../src/models/codec.js';
import { StoreError } from '../src/models/errors.js';
import type { DriftIncident, TraceEvent } from '../src/models/types.js';

let db: Database.Database;
let store: EventStore;
let seq = 0;

function makeEvent(overrides: Partial<TraceEvent> = {}): TraceEvent {
  seq++;
  return {
    id: `evt_${seq}`,
    agent_id: 'bot',
    run_id: 'run-1',
    action_type: 'tool_call',
    action_name: 'search',
    timestamp: 1_000 + seq,
    token_count: 10,
    duration_ms: 5,
    input_data: {},
    output_data: {},
    metadata: {},
    ...overrides,
  };
}

function makeIncident(overrides: Partial<DriftIncident> = {}): DriftIncident {
  seq++;
  return {
    id: `inc_${seq}`,
    agent_id: 'bot',
    run_id: 'run-1',
    detector: 'action_loop',
    severity: 'MEDIUM',
    score: 0.5,
    message: 'loop',
    suggested_action: 'look',
    timestamp: 1_000 + seq,
    context: {},
    ...overrides,
  };
}

beforeEach(() => {
  seq = 0;
  db = new Database(':memory:');
  store = new EventStore(db);
});

afterEach(() => {
  db.close();
});

describe('EventStore events', () => {
  it('reads back an appended event unchanged', () => {
    const event = makeEvent({
      action_type: 'model_request',
      input_data: { prompt: 'hi', nested: { list: [1, 2] } },
      output_data: { text: 'hello' },
      metadata: { model: 'test-model' },
    });
    store.append(event);
    expect(store.runEvents('bot', 'run-1')).toEqual([event]);
  });

  it('surfaces a corrupt payload column as a StoreError', () => {
    store.append(makeEvent({ id: 'evt_bad' }));
    db.prepare("UPDATE trace_events SET input_data = '{not json' WHERE id = 'evt_bad'").run();

    expect(() => store.runEvents('bot', 'run-1')).toThrow(
      new StoreError('runEvents failed: Stored input_data is not a JSON object', 'runEvents'),
    );
  });

  it('rejects a payload column holding a non-object', () => {
    store.append(makeEvent({ id: 'evt_bad' }));
    db.prepare("UPDATE trace_events SET metadata = '[1,2]' WHERE id = 'evt_bad'").run();

    expect(() => store.events()).toThrow('events failed: Stored metadata is not a JSON object');
  });

  it('rejects a duplicate id with a StoreError', () => {
    const event = makeEvent();
    store.append(event);
    expect(() => store.append(event)).toThrow(StoreError);
  });

  it('orders run events by timestamp then insertion', () => {
    const a = makeEvent({ id: 'a', timestamp: 50 });
    const b = makeEvent({ id: 'b', timestamp: 50 });
    const c = makeEvent({ id: 'c', timestamp: 10 });
    store.append(a);
    store.append(b);
    store.append(c);
    expect(store.runEvents('bot', 'run-1').map((e) => e.id)).toEqual(['c', 'a', 'b']);
  });

  it('returns the last N tool-call names oldest first', () => {
    const names = ['a', 'b', 'c', 'd'];
    for (const name of names) store.append(makeEvent({ action_name: name }));
    store.append(makeEvent({ action_type: 'model_request', action_name: 'plan' }));
    expect(store.recentActionNames('bot', 'run-1', 3)).toEqual(['b', 'c', 'd']);
  });

  it('keeps runs and agents apart in the action window', () => {
    store.append(makeEvent({ action_name: 'mine' }));
    store.append(makeEvent({ run_id: 'run-2', action_name: 'other-run' }));
    store.append(makeEvent({ agent_id: 'other', action_name: 'other-agent' }));
    expect(store.recentActionNames('bot', 'run-1', 20)).toEqual(['mine']);
  });

  it('filters events by agent and since, newest first', () => {
    store.append(makeEvent({ id: 'old', timestamp: 100 }));
    store.append(makeEvent({ id: 'new', timestamp: 200 }));
    store.append(makeEvent({ id: 'elsewhere', agent_id: 'other', timestamp: 300 }));
    expect(store.events({ agent_id: 'bot' }).map((e) => e.id)).toEqual(['new', 'old']);
    expect(store.events({ since: 150 }).map((e) => e.id)).toEqual(['elsewhere', 'new']);
  });
});

describe('EventStore runs', () => {
  it('lists run ids most recently active first', () => {
    store.append(makeEvent({ run_id: 'r1', timestamp: 10 }));
    store.append(makeEvent({ run_id: 'r2', timestamp: 20 }));
    store.append(makeEvent({ run_id: 'r1', timestamp: 30 }));
    expect(store.runIds('bot')).toEqual(['r1', 'r2']);
    expect(store.runIds('bot', 1)).toEqual(['r1']);
  });

  it('aggregates a run', () => {
    store.append(makeEvent({ token_count: 100, duration_ms: 10, timestamp: 5 }));
    store.append(makeEvent({ action_type: 'model_request', token_count: 300, duration_ms: 40, timestamp: 9 }));
    store.append(makeEvent({ action_type: 'state_transition', token_count: 0, duration_ms: 0, timestamp: 12 }));
    expect(store.runAggregates('bot', 'run-1')).toEqual({
      event_count: 3,
      total_tokens: 400,
      tool_calls: 1,
      model_requests: 1,
      total_duration_ms: 50,
      start_time: 5,
      end_time: 12,
    });
  });

  it('aggregates an unknown run as zeros', () => {
    expect(store.runAggregates('bot', 'missing')).toEqual({
      event_count: 0,
      total_tokens: 0,
      tool_calls: 0,
      model_requests: 0,
      total_duration_ms: 0,
      start_time: null,
      end_time: null,
    });
  });

  it('summarises agents', () => {
    store.append(makeEvent({ run_id: 'r1', timestamp: 10 }));
    store.append(makeEvent({ run_id: 'r2', timestamp: 20 }));
    store.append(makeEvent({ agent_id: 'other', timestamp: 5 }));
    expect(store.agents()).toEqual([
      { agent_id: 'bot', event_count: 2, run_count: 2, last_seen: 20 },
      { agent_id: 'other', event_count: 1, run_count: 1, last_seen: 5 },
    ]);
  });
});

describe('EventStore incidents', () => {
  it('filters by agent, severity and since, newest first', () => {
    store.appendIncident(makeIncident({ id: 'i1', timestamp: 100, severity: 'LOW' }));
    store.appendIncident(makeIncident({ id: 'i2', timestamp: 200, severity: 'HIGH' }));
    store.appendIncident(makeIncident({ id: 'i3', timestamp: 300, agent_id: 'other' }));

    expect(store.incidents().map((i) => i.id)).toEqual(['i3', 'i2', 'i1']);
    expect(store.incidents({ agent_id: 'bot' }).map((i) => i.id)).toEqual(['i2', 'i1']);
    expect(store.incidents({ severity: 'HIGH' }).map((i) => i.id)).toEqual(['i2']);
    expect(store.incidents({ since: 150, limit: 1 }).map((i) => i.id)).toEqual(['i3']);
  });

  it('round-trips incident context', () => {
    const incident = makeIncident({ context: { sequence: ['a', 'b'], repeat_count: 4 } });
    store.appendIncident(incident);
    expect(store.incidents()[0]).toEqual(incident);
  });

  it('surfaces corrupt incident context', () => {
    store.appendIncident(makeIncident({ id: 'inc_bad' }));
    db.prepare("UPDATE drift_incidents SET context = 'oops' WHERE id = 'inc_bad'").run();

    expect(() => store.incidents()).toThrow('incidents failed: Stored context is not a JSON object');
  });
});

describe('EventStore baselines', () => {
  it('returns null before any baseline is stored', () => {
    expect(store.getBaseline('bot')).toBeNull();
  });

  it('replaces the baseline wholesale', () => {
    store.putBaseline({ ...emptyBaseline('bot', 1), mean_tokens_per_run: 100 });
    const second = { ...emptyBaseline('bot', 2), calibration_runs: 3, common_sequences: [['a', 'b']] };
    store.putBaseline(second);
    expect(store.getBaseline('bot')).toEqual(second);
  });
});

describe('EventStore goal samples', () => {
  it("returns a run's similarities in time order", () => {
    store.appendGoalSample({ event_id: 'e2', agent_id: 'bot', run_id: 'run-1', similarity: 0.4, timestamp: 20 });
    store.appendGoalSample({ event_id: 'e1', agent_id: 'bot', run_id: 'run-1', similarity: 0.9, timestamp: 10 });
    store.appendGoalSample({ event_id: 'e3', agent_id: 'bot', run_id: 'run-2', similarity: 0.1, timestamp: 30 });
    expect(store.goalSimilarities('bot', 'run-1')).toEqual([0.9, 0.4]);
  });
});

describe('EventStore.open', () => {
  it('owns an in-memory connection and closes it', () => {
    const owned = EventStore.open(':memory:');
    owned.append(makeEvent());
    expect(owned.runIds('bot')).toEqual(['run-1']);
    owned.close();
    expect(() => owned.runIds('bot')).toThrow(StoreError);
  });
});
