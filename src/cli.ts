import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isPlainObject } from './utils/json.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

let version = '0.1.0';
try {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (isPlainObject(pkg) && typeof pkg.version === 'string') version = pkg.version;
} catch {
  // fallback to hardcoded version
}

const program = new Command();

program
  .name('driftwatch')
  .version(version)
  .description('Behavioural drift detection for AI agents: action loops, goal drift, and resource spikes');

// --- init ---
program
  .command('init')
  .description('Initialize a driftwatch project in the current directory')
  .option('--force', 'Overwrite existing configuration')
  .option('--dir <path>', 'Custom directory instead of .driftwatch/')
  .action(async (opts) => {
    const { runInit } = await import('./commands/init.js');
    runInit(opts);
  });

// --- demo ---
program
  .command('demo')
  .description('Simulate a support agent and show the incidents its drift produces')
  .option('--reset', 'Clear existing data first')
  .option('--dir <path>', 'Custom directory')
  .action(async (opts) => {
    const { runDemo } = await import('./commands/demo.js');
    await runDemo(opts);
  });

// --- ingest ---
program
  .command('ingest <file>')
  .description('Replay recorded events from a JSON or JSONL file through the detectors')
  .option('--format <format>', 'File format: json or jsonl (auto-detected if omitted)')
  .option('--agent <id>', 'Agent id for records that carry none')
  .option('--dry-run', 'Validate without recording')
  .option('--dir <path>', 'Custom directory')
  .action(async (file, opts) => {
    const { runIngest } = await import('./commands/ingest.js');
    await runIngest(file, opts);
  });

// --- alerts ---
program
  .command('alerts')
  .description('List recent drift incidents')
  .option('--last <duration>', 'Time window (e.g. 1h, 7d, 30m)', '24h')
  .option('--agent <id>', 'Filter by agent')
  .option('--severity <level>', 'Filter by severity: LOW, MEDIUM, HIGH, CRITICAL')
  .option('--limit <n>', 'Max results (default 20)', '20')
  .option('--detail', 'Show each incident in full')
  .option('--json', 'Output raw JSON')
  .option('--dir <path>', 'Custom directory')
  .action(async (opts) => {
    const { runAlerts } = await import('./commands/alerts.js');
    runAlerts(opts);
  });

// --- agents ---
program
  .command('agents')
  .description('List monitored agents')
  .option('--json', 'Output raw JSON')
  .option('--dir <path>', 'Custom directory')
  .action(async (opts) => {
    const { runAgents } = await import('./commands/agents.js');
    runAgents(opts);
  });

// --- runs ---
program
  .command('runs <agent>')
  .description('Per-run totals for an agent')
  .option('--limit <n>', 'Max runs (default 10)', '10')
  .option('--dir <path>', 'Custom directory')
  .action(async (agent, opts) => {
    const { runRuns } = await import('./commands/runs.js');
    runRuns(agent, opts);
  });

// --- traces ---
program
  .command('traces <agent>')
  .description('Event timeline of one run')
  .option('--run <run-id>', 'Run to show (default: latest)', 'latest')
  .option('--limit <n>', 'Show only the last N events (default 50)', '50')
  .option('--input', 'Include event input data')
  .option('--json', 'Output raw JSON')
  .option('--dir <path>', 'Custom directory')
  .action(async (agent, opts) => {
    const { runTraces } = await import('./commands/traces.js');
    runTraces(agent, opts);
  });

// --- baseline ---
program
  .command('baseline <agent>')
  .description("Show an agent's calibrated baseline")
  .option('--recompute', 'Recompute from the stored runs first')
  .option('--runs <n>', 'Number of recent runs to calibrate from (implies --recompute)')
  .option('--json', 'Output raw JSON')
  .option('--dir <path>', 'Custom directory')
  .action(async (agent, opts) => {
    const { runBaseline } = await import('./commands/baseline.js');
    runBaseline(agent, opts);
  });

// --- export ---
program
  .command('export')
  .description('Export events or incidents')
  .option('--format <format>', 'Export format: json, jsonl', 'json')
  .option('--kind <kind>', 'What to export: events, incidents', 'events')
  .option('--agent <id>', 'Filter by agent')
  .option('--since <duration>', 'Filter by time window')
  .option('--output <file>', 'Output file path (default: stdout)')
  .option('--dir <path>', 'Custom directory')
  .action(async (opts) => {
    const { runExport } = await import('./commands/export.js');
    runExport(opts);
  });

// --- config ---
const configCmd = program
  .command('config')
  .description('Manage driftwatch configuration');

configCmd
  .command('list')
  .description('Show all configuration')
  .option('--dir <path>', 'Custom directory')
  .action(async (opts) => {
    const { runConfigList } = await import('./commands/config.js');
    runConfigList(opts);
  });

configCmd
  .command('get <key>')
  .description('Get a configuration value (e.g. monitor.spike_multiplier)')
  .option('--dir <path>', 'Custom directory')
  .action(async (key, opts) => {
    const { runConfigGet } = await import('./commands/config.js');
    runConfigGet(key, opts);
  });

configCmd
  .command('set <key> <value>')
  .description('Set a configuration value (e.g. alerts.min_severity HIGH)')
  .option('--dir <path>', 'Custom directory')
  .action(async (key, value, opts) => {
    const { runConfigSet } = await import('./commands/config.js');
    runConfigSet(key, value, opts);
  });

await program.parseAsync(process.argv);
