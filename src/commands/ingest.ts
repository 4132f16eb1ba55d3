import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import type { DriftIncident } from '../models/types.js';
import { AlertDispatcher } from '../services/alert-dispatcher.js';
import { loadConfig, resolveAlertSettings, resolveMonitorOptions } from '../services/config-service.js';
import {
  detectFormat,
  isIngestFormat,
  parseRecords,
  replayRecords,
  validateRecords,
  type IngestFormat,
} from '../services/ingest-service.js';
import { incidentTable } from '../ui/table.js';
import { summaryPanel } from '../ui/boxen-panels.js';
import { failSpinner, startSpinner, successSpinner, warnSpinner } from '../ui/spinner.js';
import { errorMessage } from '../utils/json.js';
import { cliLogger, openStore } from './shared.js';

export interface IngestOptions {
  format?: string;
  agent?: string;
  dryRun?: boolean;
  dir?: string;
}

/**
 * `driftwatch ingest <file>` — read recorded events from JSON or JSONL,
 * validate them, and replay them run by run through the detectors.
 */
export async function runIngest(filePath: string, opts: IngestOptions = {}): Promise<void> {
  const absPath = resolve(filePath);
  const spinner = startSpinner(`Reading ${absPath}...`);

  let raw: string;
  try {
    raw = readFileSync(absPath, 'utf-8');
  } catch (err) {
    failSpinner(spinner, `Failed to read file: ${absPath}`);
    console.error(chalk.red(errorMessage(err)));
    return;
  }

  if (opts.format && !isIngestFormat(opts.format)) {
    failSpinner(spinner, `Invalid format: ${opts.format} (expected json or jsonl)`);
    return;
  }
  const format: IngestFormat = opts.format && isIngestFormat(opts.format) ? opts.format : detectFormat(raw, absPath);
  spinner.text = `Parsing as ${format.toUpperCase()}...`;

  let records: unknown[];
  try {
    records = parseRecords(raw, format);
  } catch (err) {
    failSpinner(spinner, `Parse error: ${errorMessage(err)}`);
    return;
  }

  if (records.length === 0) {
    failSpinner(spinner, 'No events found in file.');
    return;
  }

  spinner.text = `Validating ${records.length} event(s)...`;
  const { valid, errors } = validateRecords(records, opts.agent);

  if (errors.length > 0) {
    failSpinner(spinner, `Validation failed with ${errors.length} error(s):`);
    for (const e of errors.slice(0, 10)) {
      console.error(chalk.red(`  • ${e}`));
    }
    if (errors.length > 10) {
      console.error(chalk.dim(`  ... and ${errors.length - 10} more`));
    }
    if (valid.length === 0) return;
    console.log(chalk.yellow(`  Continuing with ${valid.length} valid event(s).`));
  }

  if (opts.dryRun) {
    successSpinner(spinner, `Dry run: ${valid.length} event(s) validated, 0 recorded.`);
    return;
  }

  spinner.text = `Replaying ${valid.length} event(s)...`;
  const config = loadConfig(opts.dir);
  const store = openStore(opts.dir);
  const logger = cliLogger(opts.dir);
  const alertSettings = resolveAlertSettings(config);
  const alerts = alertSettings.webhook_url
    ? new AlertDispatcher({
        webhookUrl: alertSettings.webhook_url,
        minSeverity: alertSettings.min_severity,
        cooldownSeconds: alertSettings.cooldown_seconds,
        logger,
      })
    : null;

  let incidents: DriftIncident[];
  let runs: number;
  let agents: number;
  try {
    const summary = await replayRecords(valid, {
      store,
      monitor: { ...resolveMonitorOptions(config), logger },
      onIncident: alerts?.handler(),
    });
    ({ incidents, runs, agents } = summary);
  } catch (err) {
    failSpinner(spinner, `Ingest failed: ${errorMessage(err)}`);
    return;
  }

  const recorded = `Recorded ${valid.length} event(s) across ${runs} run(s)`;
  if (incidents.length > 0) {
    warnSpinner(spinner, `${recorded}, ${incidents.length} drift incident(s).`);
  } else {
    successSpinner(spinner, `${recorded}.`);
  }

  console.log('');
  console.log(
    summaryPanel('Ingest Summary', {
      Agents: agents,
      Runs: runs,
      'Events recorded': valid.length,
      'Validation errors': errors.length,
      'Drift incidents': incidents.length,
    }),
  );
  console.log('');

  if (incidents.length > 0) {
    console.log(incidentTable([...incidents].reverse()));
    console.log('');
  }
}
