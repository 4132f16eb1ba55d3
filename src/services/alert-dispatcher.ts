import type { Severity } from '../models/enums.js';
import { severityRank } from '../models/enums.js';
import type { DriftIncident } from '../models/types.js';
import { encodeIncident } from '../models/codec.js';
import { errorMessage } from '../utils/json.js';
import { createLogger, type StructuredLogger } from '../utils/logger.js';

// ── Types ─────────────────────────────────────────────────────────────────

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

export interface AlertDispatcherOptions {
  webhookUrl?: string | null;
  minSeverity?: Severity;
  cooldownSeconds?: number;
  timeoutMs?: number;
  fetch?: FetchFunction;
  logger?: StructuredLogger;
  clock?: () => number;
}

export type WebhookFlavor = 'slack' | 'discord' | 'generic';

// ── Presentation ──────────────────────────────────────────────────────────

export const SEVERITY_COLORS: Record<Severity, string> = {
  LOW: '#36a64f',
  MEDIUM: '#daa520',
  HIGH: '#ff6600',
  CRITICAL: '#ff0000',
};

const SEVERITY_EMOJI: Record<Severity, string> = {
  LOW: '🟢',
  MEDIUM: '🟡',
  HIGH: '🟠',
  CRITICAL: '🔴',
};

export function webhookFlavor(url: string): WebhookFlavor {
  if (url.includes('hooks.slack.com')) return 'slack';
  if (url.includes('discord.com')) return 'discord';
  return 'generic';
}

function formatUtc(epochMs: number): string {
  return `${new Date(epochMs).toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function slackPayload(incident: DriftIncident): Record<string, unknown> {
  const text =
    `${SEVERITY_EMOJI[incident.severity]} *[${incident.severity}] Driftwatch Alert*\n` +
    `*Agent:* \`${incident.agent_id}\`\n` +
    `*Detector:* ${incident.detector}\n` +
    `*Time:* ${formatUtc(incident.timestamp)}\n\n` +
    `${incident.message}\n\n` +
    `💡 *Suggested action:* ${incident.suggested_action}`;

  return {
    attachments: [
      {
        color: SEVERITY_COLORS[incident.severity],
        blocks: [{ type: 'section', text: { type: 'mrkdwn', text } }],
      },
    ],
  };
}

export function discordPayload(incident: DriftIncident): Record<string, unknown> {
  return {
    embeds: [
      {
        title: `${SEVERITY_EMOJI[incident.severity]} [${incident.severity}] Driftwatch Alert`,
        color: parseInt(SEVERITY_COLORS[incident.severity].slice(1), 16),
        fields: [
          { name: 'Agent', value: `\`${incident.agent_id}\``, inline: true },
          { name: 'Detector', value: incident.detector, inline: true },
          { name: 'Time', value: formatUtc(incident.timestamp), inline: true },
          { name: 'Details', value: incident.message, inline: false },
          { name: '💡 Suggested Action', value: incident.suggested_action, inline: false },
        ],
      },
    ],
  };
}

export function genericPayload(incident: DriftIncident): Record<string, unknown> {
  return { source: 'driftwatch', incident: encodeIncident(incident) };
}

// ── Dispatcher ────────────────────────────────────────────────────────────

/**
 * Posts incidents to a Slack, Discord, or generic JSON webhook, filtered by
 * minimum severity and a cooldown per (agent, detector) pair.
 *
 *   const alerts = new AlertDispatcher({ webhookUrl: process.env.DRIFTWATCH_WEBHOOK_URL });
 *   monitor.onDrift(alerts.handler());
 */
export class AlertDispatcher {
  readonly webhookUrl: string | null;
  readonly minSeverity: Severity;
  readonly cooldownSeconds: number;
  private timeoutMs: number;
  private fetchFn: FetchFunction;
  private logger: StructuredLogger;
  private clock: () => number;
  private lastAlert = new Map<string, number>();

  constructor(options: AlertDispatcherOptions = {}) {
    this.webhookUrl = options.webhookUrl || null;
    this.minSeverity = options.minSeverity ?? 'MEDIUM';
    this.cooldownSeconds = options.cooldownSeconds ?? 60;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createLogger();
    this.clock = options.clock ?? Date.now;
  }

  /** Severity and cooldown gate. A true result starts the cooldown. */
  shouldAlert(incident: DriftIncident): boolean {
    if (!this.webhookUrl) return false;
    if (severityRank(incident.severity) < severityRank(this.minSeverity)) return false;

    const key = `${incident.agent_id}:${incident.detector}`;
    const now = this.clock();
    const last = this.lastAlert.get(key);
    if (last != null && now - last < this.cooldownSeconds * 1000) return false;

    this.lastAlert.set(key, now);
    return true;
  }

  buildPayload(incident: DriftIncident): Record<string, unknown> {
    if (!this.webhookUrl) return {};
    switch (webhookFlavor(this.webhookUrl)) {
      case 'slack':
        return slackPayload(incident);
      case 'discord':
        return discordPayload(incident);
      default:
        return genericPayload(incident);
    }
  }

  /** Deliver one incident. Resolves false when filtered out or on any failure. */
  async send(incident: DriftIncident): Promise<boolean> {
    const url = this.webhookUrl;
    if (!url || !this.shouldAlert(incident)) return false;

    try {
      const res = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(this.buildPayload(incident)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        this.logger.warn('Failed to send alert', { incident_id: incident.id, status: res.status });
        return false;
      }
      this.logger.info('Alert sent', { agent_id: incident.agent_id, message: incident.message });
      return true;
    } catch (err) {
      this.logger.warn('Failed to send alert', { incident_id: incident.id, error: errorMessage(err) });
      return false;
    }
  }

  /** An `onDrift` callback that forwards to `send`. */
  handler(): (incident: DriftIncident) => Promise<void> {
    return async (incident) => {
      await this.send(incident);
    };
  }
}
