import chalk from 'chalk';
import type { IncidentFilter } from '../models/types.js';
import { encodeIncident } from '../models/codec.js';
import { incidentTable } from '../ui/table.js';
import { incidentPanel } from '../ui/boxen-panels.js';
import { heading } from '../ui/theme.js';
import { safeParseInt } from '../utils/json.js';
import { parseSinceToEpoch } from '../utils/time.js';
import { isValidSeverity } from '../utils/validators.js';
import { openStore, printError } from './shared.js';

export interface AlertsOptions {
  last?: string;
  agent?: string;
  severity?: string;
  limit?: string;
  json?: boolean;
  detail?: boolean;
  dir?: string;
}

/**
 * `driftwatch alerts` — recent drift incidents, newest first.
 */
export function runAlerts(opts: AlertsOptions = {}): void {
  const filter: IncidentFilter = { limit: safeParseInt(opts.limit, 20) };

  if (opts.agent) filter.agent_id = opts.agent;
  if (opts.severity) {
    const severity = opts.severity.toUpperCase();
    if (!isValidSeverity(severity)) {
      console.error(chalk.red(`  Invalid severity: ${opts.severity}`));
      console.error(chalk.dim('  Valid: LOW, MEDIUM, HIGH, CRITICAL'));
      return;
    }
    filter.severity = severity;
  }
  try {
    filter.since = parseSinceToEpoch(opts.last ?? '24h');
  } catch (err) {
    printError('Invalid --last', err);
    return;
  }

  const incidents = openStore(opts.dir).incidents(filter);

  if (opts.json) {
    console.log(JSON.stringify(incidents.map(encodeIncident), null, 2));
    return;
  }

  if (incidents.length === 0) {
    console.log('');
    console.log(chalk.dim(`  No drift incidents in the last ${opts.last ?? '24h'}.`));
    console.log('');
    return;
  }

  console.log('');
  console.log(heading(`  Drift incidents (${incidents.length})`));
  console.log('');
  if (opts.detail) {
    for (const incident of incidents) {
      console.log(incidentPanel(incident));
    }
  } else {
    console.log(incidentTable(incidents));
  }
  console.log('');
}
