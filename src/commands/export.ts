import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import {
  EXPORT_FORMATS,
  EXPORT_KINDS,
  exportRecords,
  isExportFormat,
  isExportKind,
  type ExportFilter,
} from '../services/export-service.js';
import { failSpinner, startSpinner, successSpinner } from '../ui/spinner.js';
import { errorMessage } from '../utils/json.js';
import { parseSinceToEpoch } from '../utils/time.js';
import { openStore } from './shared.js';

export interface ExportOptions {
  format?: string;
  kind?: string;
  agent?: string;
  since?: string;
  output?: string;
  dir?: string;
}

/**
 * `driftwatch export` — dump events or incidents as JSON or JSONL to
 * --output or stdout.
 */
export function runExport(opts: ExportOptions = {}): void {
  const format = opts.format ?? 'json';
  if (!isExportFormat(format)) {
    console.error(chalk.red(`  Invalid format: ${format}`));
    console.error(chalk.dim(`  Valid formats: ${EXPORT_FORMATS.join(', ')}`));
    return;
  }

  const kind = opts.kind ?? 'events';
  if (!isExportKind(kind)) {
    console.error(chalk.red(`  Invalid kind: ${kind}`));
    console.error(chalk.dim(`  Valid kinds: ${EXPORT_KINDS.join(', ')}`));
    return;
  }

  const spinner = startSpinner(`Exporting ${kind} as ${format.toUpperCase()}...`);

  try {
    const filter: ExportFilter = {};
    if (opts.agent) filter.agent_id = opts.agent;
    if (opts.since) filter.since = parseSinceToEpoch(opts.since);

    const output = exportRecords(openStore(opts.dir), kind, format, filter);

    if (opts.output) {
      const outPath = resolve(opts.output);
      writeFileSync(outPath, output);
      successSpinner(spinner, `Exported to ${outPath}`);
    } else {
      spinner.stop();
      process.stdout.write(output);
    }
  } catch (err) {
    failSpinner(spinner, `Export failed: ${errorMessage(err)}`);
  }
}
