import { existsSync, rmSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import chalk from 'chalk';
import { DEFAULT_DATA_DIR } from '../db/index.js';
import { configPath } from '../services/config-service.js';
import { DEMO_AGENT_ID, seedDemoData, type DemoRunResult } from '../demo/seed-data.js';
import { incidentTable } from '../ui/table.js';
import { colors, heading, separator, severityBadge } from '../ui/theme.js';
import { failSpinner, startSpinner, successSpinner } from '../ui/spinner.js';
import { errorMessage } from '../utils/json.js';
import { runInit } from './init.js';
import { cliLogger, openStore } from './shared.js';

export interface DemoOptions {
  reset?: boolean;
  dir?: string;
}

function describeRun(result: DemoRunResult): string {
  if (result.incidents.length === 0) {
    return `  ${chalk.green('✔')} ${chalk.white(result.label)} ${chalk.dim('no drift')}`;
  }
  const worst = result.incidents.reduce((a, b) => (b.score > a.score ? b : a));
  return (
    `  ${chalk.redBright('✘')} ${chalk.white(result.label)} ` +
    `${severityBadge(worst.severity)} ${chalk.dim(`${result.incidents.length} incident(s)`)}`
  );
}

/**
 * `driftwatch demo` — simulate a support agent: healthy runs to calibrate a
 * baseline, then runs that loop, spike, and drift off-goal.
 */
export async function runDemo(opts: DemoOptions = {}): Promise<void> {
  const baseDir = resolve(opts.dir ?? DEFAULT_DATA_DIR);

  // Reset if requested; only ever delete a driftwatch data directory
  if (opts.reset && existsSync(baseDir)) {
    const baseName = basename(baseDir);
    if (!baseName.startsWith('.driftwatch') && !baseName.startsWith('driftwatch')) {
      console.error(chalk.red(`  Refusing to delete "${baseDir}": expected a driftwatch data directory.`));
      return;
    }
    rmSync(baseDir, { recursive: true });
    console.log(chalk.dim('  Cleared existing data.'));
  }

  if (!existsSync(configPath(baseDir))) {
    runInit({ dir: baseDir });
  }

  const store = openStore(baseDir);
  if (store.runIds(DEMO_AGENT_ID, 1).length > 0 && !opts.reset) {
    console.log(chalk.yellow('  Demo data appears to already be loaded.'));
    console.log(chalk.dim('  Use --reset to clear and reload.'));
    console.log('');
    return;
  }

  const spinner = startSpinner('Simulating agent runs...');
  let results: DemoRunResult[];
  try {
    results = await seedDemoData(store, {
      logger: cliLogger(baseDir),
      onRun: (result) => {
        spinner.text = `Simulating agent runs... (${result.label})`;
      },
    });
    successSpinner(spinner, `Recorded ${results.length} runs for ${DEMO_AGENT_ID}.`);
  } catch (err) {
    failSpinner(spinner, `Demo failed: ${errorMessage(err)}`);
    return;
  }

  console.log('');
  console.log(heading('  Runs:'));
  for (const result of results) {
    console.log(describeRun(result));
  }
  console.log('');

  const incidents = results.flatMap((r) => r.incidents);
  if (incidents.length > 0) {
    console.log(heading('  Drift incidents:'));
    console.log('');
    console.log(incidentTable([...incidents].reverse()));
    console.log('');
  }

  console.log(separator());
  console.log('');
  console.log(colors.primary.bold('  Explore the demo data:'));
  console.log('');
  console.log(`    ${chalk.cyanBright('1.')} ${chalk.white('driftwatch alerts')}                   ${chalk.dim('Recent incidents')}`);
  console.log(`    ${chalk.cyanBright('2.')} ${chalk.white(`driftwatch runs ${DEMO_AGENT_ID}`)}     ${chalk.dim('Per-run totals')}`);
  console.log(`    ${chalk.cyanBright('3.')} ${chalk.white(`driftwatch traces ${DEMO_AGENT_ID}`)}   ${chalk.dim('Latest run timeline')}`);
  console.log(`    ${chalk.cyanBright('4.')} ${chalk.white(`driftwatch baseline ${DEMO_AGENT_ID}`)} ${chalk.dim('Calibrated norms')}`);
  console.log('');
}
