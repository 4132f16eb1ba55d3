import { REFUND_GOAL, type DemoRun } from './types.js';

/**
 * A well-behaved support run: plan, three distinct tools, short reply.
 * `variant` nudges token counts so the baseline has some spread.
 */
export function healthyRefund(variant: number): DemoRun {
  return {
    label: `healthy refund #${variant + 1}`,
    goal: REFUND_GOAL,
    events: [
      {
        action_type: 'model_request',
        action_name: 'plan',
        token_count: 300 + (variant % 3) * 20,
        duration_ms: 800,
        input_data: { prompt: 'Customer asks for a refund on order #4821' },
        output_data: { text: "I will look up the customer's order and process the refund request." },
      },
      {
        action_type: 'tool_call',
        action_name: 'lookup_order',
        token_count: 50,
        duration_ms: 120,
        input_data: { order_id: '4821' },
        output_data: { status: 'delivered', total: 59.9 },
      },
      {
        action_type: 'tool_call',
        action_name: 'check_refund_policy',
        token_count: 50,
        duration_ms: 90,
        output_data: { eligible: true },
      },
      {
        action_type: 'tool_call',
        action_name: 'issue_refund',
        token_count: 50,
        duration_ms: 200,
        input_data: { order_id: '4821', amount: 59.9 },
      },
      {
        action_type: 'model_request',
        action_name: 'respond',
        token_count: 400 + (variant % 2) * 30,
        duration_ms: 300,
        output_data: { text: 'Refund issued.' },
      },
    ],
  };
}
