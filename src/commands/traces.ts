import chalk from 'chalk';
import { encodeTraceEvent } from '../models/codec.js';
import { renderTimeline } from '../ui/timeline.js';
import { heading, label } from '../ui/theme.js';
import { safeParseInt } from '../utils/json.js';
import { openStore } from './shared.js';

export interface TracesOptions {
  run?: string;
  limit?: string;
  json?: boolean;
  input?: boolean;
  dir?: string;
}

/**
 * `driftwatch traces <agent>` — event timeline of one run (the latest by
 * default), with incidents shown under the event that raised them.
 */
export function runTraces(agentId: string, opts: TracesOptions = {}): void {
  const store = openStore(opts.dir);
  const runId = !opts.run || opts.run === 'latest' ? store.runIds(agentId, 1)[0] : opts.run;

  if (!runId) {
    console.log('');
    console.log(chalk.dim(`  No runs recorded for ${agentId}.`));
    console.log('');
    return;
  }

  const limit = safeParseInt(opts.limit, 50);
  const events = store.runEvents(agentId, runId).slice(-limit);
  const incidents = store.incidents({ agent_id: agentId, limit: 1000 }).filter((i) => i.run_id === runId);

  if (opts.json) {
    console.log(JSON.stringify(events.map(encodeTraceEvent), null, 2));
    return;
  }

  console.log('');
  console.log(heading(`  ${agentId}`) + chalk.dim(`  run ${runId}`));
  console.log(`  ${label('Events:')} ${events.length}  ${label('Incidents:')} ${incidents.length}`);
  console.log('');
  console.log(renderTimeline(events, { incidents, showInput: opts.input }));
  console.log('');
}
