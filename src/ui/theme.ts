import chalk, { type ChalkInstance } from 'chalk';
import type { ActionType, DetectorType, Severity } from '../models/enums.js';
import { ACTION_TYPE_ICONS, ACTION_TYPE_LABELS, DETECTOR_LABELS } from '../models/enums.js';

// ── Color palette ─────────────────────────────────────────────────────────

export const colors = {
  primary: chalk.cyanBright,
  secondary: chalk.magentaBright,
  success: chalk.green,
  error: chalk.redBright,
  warning: chalk.yellow,
  muted: chalk.dim,
  info: chalk.blue,
  highlight: chalk.whiteBright.bold,
};

// ── Text helpers ──────────────────────────────────────────────────────────

export function heading(text: string): string {
  return chalk.bold(colors.primary(text));
}

export function label(text: string): string {
  return chalk.dim(text);
}

// ── Severity badge ────────────────────────────────────────────────────────

const SEVERITY_STYLES: Record<Severity, ChalkInstance> = {
  LOW: chalk.bgGreen.black.bold,
  MEDIUM: chalk.bgYellow.black.bold,
  HIGH: chalk.bgRgb(255, 102, 0).black.bold,
  CRITICAL: chalk.bgRed.white.bold,
};

export function severityBadge(severity: Severity): string {
  return SEVERITY_STYLES[severity](` ${severity} `);
}

// ── Score badge (green→red as drift grows) ────────────────────────────────

export function scoreBadge(score: number): string {
  const display = score.toFixed(2);
  if (score >= 0.9) return chalk.redBright.bold(display);
  if (score >= 0.7) return chalk.rgb(255, 165, 0)(display); // orange
  if (score >= 0.5) return chalk.yellow(display);
  return chalk.green(display);
}

// ── Action & detector labels ──────────────────────────────────────────────

const ACTION_COLORS: Record<ActionType, ChalkInstance> = {
  tool_call: chalk.yellowBright,
  model_request: chalk.magentaBright,
  state_transition: chalk.blueBright,
};

export function actionIcon(actionType: ActionType): string {
  return ACTION_COLORS[actionType](ACTION_TYPE_ICONS[actionType]);
}

export function actionLabel(actionType: ActionType): string {
  return ACTION_COLORS[actionType](ACTION_TYPE_LABELS[actionType]);
}

export function detectorLabel(detector: DetectorType): string {
  return chalk.white(DETECTOR_LABELS[detector]);
}

// ── Separator ─────────────────────────────────────────────────────────────

export function separator(width?: number): string {
  const w = Math.max(1, width ?? (process.stdout.columns || 80));
  return chalk.dim('─'.repeat(Math.min(w, 120)));
}
