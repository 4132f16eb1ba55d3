import type { DriftIncident } from '../models/types.js';
import type { EventStore } from '../services/event-store.js';
import { DriftMonitor } from '../services/monitor.js';
import type { StructuredLogger } from '../utils/logger.js';
import { bagOfWordsEmbedding } from './embedding.js';
import { healthyRefund } from './scenarios/healthy-refund.js';
import { offTopic } from './scenarios/off-topic.js';
import { tokenSpike } from './scenarios/token-spike.js';
import { toolLoop } from './scenarios/tool-loop.js';
import type { DemoRun } from './scenarios/types.js';

export const DEMO_AGENT_ID = 'support-bot';
export const DEMO_CALIBRATION_RUNS = 8;

export interface DemoRunResult {
  run_id: string;
  label: string;
  incidents: DriftIncident[];
}

export interface SeedOptions {
  logger?: StructuredLogger;
  onRun?: (result: DemoRunResult) => void;
}

export function demoRuns(): DemoRun[] {
  return [
    ...Array.from({ length: DEMO_CALIBRATION_RUNS }, (_, i) => healthyRefund(i)),
    toolLoop(),
    tokenSpike(),
    offTopic(),
  ];
}

/**
 * Drive the demo scenarios through a monitor: enough healthy runs to
 * calibrate a baseline, then a looping run, a token spike, and an
 * off-topic reply.
 */
export async function seedDemoData(store: EventStore, options: SeedOptions = {}): Promise<DemoRunResult[]> {
  const monitor = new DriftMonitor({
    agentId: DEMO_AGENT_ID,
    store,
    calibrationRuns: DEMO_CALIBRATION_RUNS,
    similarityThreshold: 0.3,
    embed: bagOfWordsEmbedding(),
    logger: options.logger,
  });

  const results: DemoRunResult[] = [];
  for (const run of demoRuns()) {
    const runId = monitor.startRun(undefined, run.goal);
    const incidents: DriftIncident[] = [];
    for (const event of run.events) {
      incidents.push(...(await monitor.recordEvent(event)));
    }
    monitor.endRun(runId);

    const result = { run_id: runId, label: run.label, incidents };
    results.push(result);
    options.onRun?.(result);
  }

  monitor.close();
  return results;
}
