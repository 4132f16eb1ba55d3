import boxen from 'boxen';
import chalk from 'chalk';
import type { BaselineStats, DriftIncident } from '../models/types.js';
import { colors, detectorLabel, label, severityBadge } from './theme.js';
import { formatDuration, formatTimestamp } from '../utils/time.js';

/**
 * Welcome panel shown after `driftwatch init`.
 */
export function welcomePanel(dbPath: string): string {
  const content = [
    chalk.whiteBright.bold('driftwatch initialized!'),
    '',
    `${label('Database:')}  ${chalk.dim(dbPath)}`,
    '',
    `${colors.primary('Next steps:')}`,
    `  ${chalk.white('driftwatch demo')}      ${chalk.dim('Simulate healthy and drifting runs')}`,
    `  ${chalk.white('driftwatch ingest')}    ${chalk.dim('Replay your own recorded events')}`,
    `  ${chalk.white('driftwatch alerts')}    ${chalk.dim('Review detected drift')}`,
    `  ${chalk.white('driftwatch --help')}    ${chalk.dim('See all commands')}`,
  ].join('\n');

  return boxen(content, {
    title: 'driftwatch',
    titleAlignment: 'center',
    padding: 1,
    borderColor: 'cyan',
    borderStyle: 'round',
  });
}

/**
 * An agent's baseline: per-run norms, goal alignment, and common sequences.
 */
export function baselinePanel(baseline: BaselineStats): string {
  const status = baseline.is_calibrated
    ? chalk.greenBright('calibrated')
    : chalk.yellow('calibrating');

  const lines = [
    `${label('Agent:')}        ${chalk.whiteBright.bold(baseline.agent_id)}`,
    `${label('Status:')}       ${status} ${chalk.dim(`(${baseline.calibration_runs} runs)`)}`,
    `${label('Tokens/run:')}   ${chalk.white(baseline.mean_tokens_per_run.toFixed(0))} ${chalk.dim(`± ${baseline.std_tokens_per_run.toFixed(0)}`)}`,
    `${label('Tools/run:')}    ${chalk.white(baseline.mean_tools_per_run.toFixed(1))} ${chalk.dim(`± ${baseline.std_tools_per_run.toFixed(1)}`)}`,
    `${label('Duration/run:')} ${chalk.white(formatDuration(baseline.mean_duration_ms))} ${chalk.dim(`± ${formatDuration(baseline.std_duration_ms)}`)}`,
  ];

  if (baseline.mean_goal_similarity > 0) {
    lines.push(
      `${label('Goal sim.:')}    ${chalk.white(baseline.mean_goal_similarity.toFixed(2))} ${chalk.dim(`± ${baseline.std_goal_similarity.toFixed(2)}`)}`,
    );
  }
  if (baseline.updated_at > 0) {
    lines.push(`${label('Updated:')}      ${chalk.dim(formatTimestamp(baseline.updated_at))}`);
  }

  if (baseline.common_sequences.length > 0) {
    lines.push('');
    lines.push(label('Common sequences:'));
    for (const seq of baseline.common_sequences) {
      lines.push(`  ${chalk.dim('-')} ${chalk.white(seq.join(' → '))}`);
    }
  }

  return boxen(lines.join('\n'), {
    title: ' Baseline ',
    titleAlignment: 'center',
    padding: 1,
    borderColor: baseline.is_calibrated ? 'green' : 'yellow',
    borderStyle: 'round',
  });
}

/**
 * Single incident with its suggested remediation.
 */
export function incidentPanel(incident: DriftIncident): string {
  const lines = [
    `${severityBadge(incident.severity)}  ${detectorLabel(incident.detector)}  ${chalk.dim(`score ${incident.score.toFixed(2)}`)}`,
    '',
    chalk.white(incident.message),
    '',
    `${label('Suggested:')} ${chalk.white(incident.suggested_action)}`,
    `${label('Run:')}       ${chalk.dim(incident.run_id)}`,
  ];

  return boxen(lines.join('\n'), {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderColor: incident.severity === 'LOW' ? 'gray' : 'red',
    borderStyle: 'round',
  });
}

/**
 * Generic summary stats panel.
 */
export function summaryPanel(title: string, stats: Record<string, string | number>): string {
  const lines = Object.entries(stats).map(([k, v]) => `${label(k + ':')}  ${chalk.white(String(v))}`);

  return boxen(lines.join('\n'), {
    title,
    titleAlignment: 'center',
    padding: 1,
    borderColor: 'cyan',
    borderStyle: 'round',
  });
}
