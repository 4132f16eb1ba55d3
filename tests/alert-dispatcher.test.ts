import { describe, it, expect, vi } from 'vitest';
import {
  AlertDispatcher,
  discordPayload,
  genericPayload,
  slackPayload,
  webhookFlavor,
} from '../src/services/alert-dispatcher.js';
import { MemorySink, StructuredLogger } from '../src/utils/logger.js';
import type { DriftIncident } from '../src/models/types.js';

const SLACK_URL = 'https://hooks.slack.com/services/test-secret';
const DISCORD_URL = 'https://discord.com/api/webhooks/test-secret';
const GENERIC_URL = 'https://alerts.example.test/drift';

function makeIncident(overrides: Partial<DriftIncident> = {}): DriftIncident {
  return {
    id: 'inc_1',
    agent_id: 'support-bot',
    run_id: 'run-1',
    detector: 'action_loop',
    severity: 'HIGH',
    score: 0.75,
    message: 'Action loop: search_db called 6x consecutively',
    suggested_action: 'Check search_db input/output for stale data or error loops',
    timestamp: Date.UTC(2024, 2, 5, 14, 7, 30),
    context: {},
    ...overrides,
  };
}

function okFetch() {
  return vi.fn(async (_url: string, _init: RequestInit) => new Response(null, { status: 200 }));
}

describe('payload builders', () => {
  it('detects the webhook flavour from the URL', () => {
    expect(webhookFlavor(SLACK_URL)).toBe('slack');
    expect(webhookFlavor(DISCORD_URL)).toBe('discord');
    expect(webhookFlavor(GENERIC_URL)).toBe('generic');
  });

  it('builds a Slack attachment', () => {
    expect(slackPayload(makeIncident())).toEqual({
      attachments: [
        {
          color: '#ff6600',
          blocks: [
            {
              type: 'section',
              text: {
                type: 'mrkdwn',
                text:
                  '🟠 *[HIGH] Driftwatch Alert*\n' +
                  '*Agent:* `support-bot`\n' +
                  '*Detector:* action_loop\n' +
                  '*Time:* 2024-03-05 14:07 UTC\n\n' +
                  'Action loop: search_db called 6x consecutively\n\n' +
                  '💡 *Suggested action:* Check search_db input/output for stale data or error loops',
              },
            },
          ],
        },
      ],
    });
  });

  it('builds a Discord embed with a numeric colour', () => {
    const payload = discordPayload(makeIncident({ severity: 'CRITICAL' }));
    expect(payload).toMatchObject({
      embeds: [{ title: '🔴 [CRITICAL] Driftwatch Alert', color: 0xff0000 }],
    });
  });

  it('wraps the encoded incident for generic webhooks', () => {
    const incident = makeIncident();
    expect(genericPayload(incident)).toEqual({ source: 'driftwatch', incident: { ...incident } });
  });
});

describe('AlertDispatcher', () => {
  it('posts JSON to the webhook', async () => {
    const fetch = okFetch();
    const dispatcher = new AlertDispatcher({ webhookUrl: GENERIC_URL, fetch, logger: new StructuredLogger({ sinks: [] }) });

    expect(await dispatcher.send(makeIncident())).toBe(true);
    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(GENERIC_URL);
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(typeof init.body === 'string' && JSON.parse(init.body).source).toBe('driftwatch');
  });

  it('does nothing without a webhook URL', async () => {
    const fetch = okFetch();
    const dispatcher = new AlertDispatcher({ webhookUrl: '', fetch });
    expect(dispatcher.webhookUrl).toBeNull();
    expect(await dispatcher.send(makeIncident())).toBe(false);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('filters incidents below the minimum severity', () => {
    const dispatcher = new AlertDispatcher({ webhookUrl: GENERIC_URL, minSeverity: 'HIGH' });
    expect(dispatcher.shouldAlert(makeIncident({ severity: 'MEDIUM' }))).toBe(false);
    expect(dispatcher.shouldAlert(makeIncident({ severity: 'CRITICAL' }))).toBe(true);
  });

  it('applies a cooldown per agent and detector', () => {
    let now = 0;
    const dispatcher = new AlertDispatcher({ webhookUrl: GENERIC_URL, cooldownSeconds: 60, clock: () => now });

    expect(dispatcher.shouldAlert(makeIncident())).toBe(true);
    now = 30_000;
    expect(dispatcher.shouldAlert(makeIncident())).toBe(false);
    expect(dispatcher.shouldAlert(makeIncident({ detector: 'goal_drift' }))).toBe(true);
    expect(dispatcher.shouldAlert(makeIncident({ agent_id: 'other-bot' }))).toBe(true);
    now = 60_000;
    expect(dispatcher.shouldAlert(makeIncident())).toBe(true);
  });

  it('reports a non-2xx response as a failed send', async () => {
    const sink = new MemorySink();
    const dispatcher = new AlertDispatcher({
      webhookUrl: GENERIC_URL,
      fetch: async () => new Response(null, { status: 500 }),
      logger: new StructuredLogger({ sinks: [sink] }),
    });
    expect(await dispatcher.send(makeIncident())).toBe(false);
    expect(sink.getEntries()[0].data).toEqual({ incident_id: 'inc_1', status: 500 });
  });

  it('swallows network errors with a warning', async () => {
    const sink = new MemorySink();
    const dispatcher = new AlertDispatcher({
      webhookUrl: GENERIC_URL,
      fetch: async () => {
        throw new Error('connection refused');
      },
      logger: new StructuredLogger({ sinks: [sink] }),
    });
    expect(await dispatcher.send(makeIncident())).toBe(false);
    expect(sink.getEntries()[0]).toMatchObject({
      level: 'warn',
      message: 'Failed to send alert',
      data: { incident_id: 'inc_1', error: 'connection refused' },
    });
  });

  it('chooses the payload by webhook flavour', () => {
    expect(new AlertDispatcher({ webhookUrl: SLACK_URL }).buildPayload(makeIncident())).toHaveProperty('attachments');
    expect(new AlertDispatcher({ webhookUrl: DISCORD_URL }).buildPayload(makeIncident())).toHaveProperty('embeds');
  });

  it('handler() forwards to send', async () => {
    const fetch = okFetch();
    const dispatcher = new AlertDispatcher({ webhookUrl: GENERIC_URL, fetch, logger: new StructuredLogger({ sinks: [] }) });
    await dispatcher.handler()(makeIncident());
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});
