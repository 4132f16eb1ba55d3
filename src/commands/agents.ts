import chalk from 'chalk';
import { agentTable } from '../ui/table.js';
import { heading } from '../ui/theme.js';
import { openStore } from './shared.js';

export interface AgentsOptions {
  json?: boolean;
  dir?: string;
}

export function runAgents(opts: AgentsOptions = {}): void {
  const agents = openStore(opts.dir).agents();

  if (opts.json) {
    console.log(JSON.stringify(agents, null, 2));
    return;
  }

  if (agents.length === 0) {
    console.log('');
    console.log(chalk.dim('  No agents recorded yet.'));
    console.log(chalk.dim('  Run ') + chalk.white('driftwatch demo') + chalk.dim(' to load sample data.'));
    console.log('');
    return;
  }

  console.log('');
  console.log(heading(`  Agents (${agents.length})`));
  console.log('');
  console.log(agentTable(agents));
  console.log('');
}
