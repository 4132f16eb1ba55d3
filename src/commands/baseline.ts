import chalk from 'chalk';
import { encodeBaseline } from '../models/codec.js';
import { BaselineCalibrator } from '../services/calibrator.js';
import { loadConfig, resolveMonitorOptions } from '../services/config-service.js';
import { baselinePanel } from '../ui/boxen-panels.js';
import { safeParseInt } from '../utils/json.js';
import { cliLogger, openStore } from './shared.js';

export interface BaselineOptions {
  recompute?: boolean;
  runs?: string;
  json?: boolean;
  dir?: string;
}

/**
 * `driftwatch baseline <agent>` — show (or rebuild) an agent's baseline.
 */
export function runBaseline(agentId: string, opts: BaselineOptions = {}): void {
  const store = openStore(opts.dir);

  let baseline = store.getBaseline(agentId);
  if (opts.recompute || opts.runs) {
    const configured = resolveMonitorOptions(loadConfig(opts.dir)).calibrationRuns;
    const calibrator = new BaselineCalibrator(store, {
      requiredRuns: safeParseInt(opts.runs, configured),
      logger: cliLogger(opts.dir),
    });
    baseline = calibrator.recompute(agentId);
  }

  if (!baseline) {
    console.log('');
    console.log(chalk.dim(`  No baseline for ${agentId} yet.`));
    console.log(chalk.dim('  One is built when a run ends, or run ') + chalk.white(`driftwatch baseline ${agentId} --recompute`));
    console.log('');
    return;
  }

  if (opts.json) {
    console.log(JSON.stringify(encodeBaseline(baseline), null, 2));
    return;
  }

  console.log('');
  console.log(baselinePanel(baseline));
  console.log('');
}
