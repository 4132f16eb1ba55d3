import chalk from 'chalk';
import { runTable, type RunRow } from '../ui/table.js';
import { heading } from '../ui/theme.js';
import { safeParseInt } from '../utils/json.js';
import { openStore } from './shared.js';

export interface RunsOptions {
  limit?: string;
  dir?: string;
}

/**
 * `driftwatch runs <agent>` — per-run totals, most recent first.
 */
export function runRuns(agentId: string, opts: RunsOptions = {}): void {
  const store = openStore(opts.dir);
  const runIds = store.runIds(agentId, safeParseInt(opts.limit, 10));

  if (runIds.length === 0) {
    console.log('');
    console.log(chalk.dim(`  No runs recorded for ${agentId}.`));
    console.log(chalk.dim('  Run ') + chalk.white('driftwatch demo') + chalk.dim(' to load sample data.'));
    console.log('');
    return;
  }

  const incidents = store.incidents({ agent_id: agentId, limit: 10_000 });
  const rows: RunRow[] = runIds.map((runId) => ({
    run_id: runId,
    stats: store.runAggregates(agentId, runId),
    incident_count: incidents.filter((i) => i.run_id === runId).length,
  }));

  console.log('');
  console.log(heading(`  Runs for ${agentId}`));
  console.log('');
  console.log(runTable(rows));
  console.log('');
}
