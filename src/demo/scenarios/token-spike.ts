import { REFUND_GOAL, type DemoRun } from './types.js';

/** A retrieval step stuffs the whole order history into the prompt. */
export function tokenSpike(): DemoRun {
  return {
    label: 'context window blow-up',
    goal: REFUND_GOAL,
    events: [
      {
        action_type: 'tool_call',
        action_name: 'lookup_order',
        token_count: 50,
        duration_ms: 120,
        input_data: { order_id: '4821', include_history: true },
      },
      {
        action_type: 'model_request',
        action_name: 'plan',
        token_count: 6_000,
        duration_ms: 4_200,
        input_data: { prompt: '<1,200 past orders inlined>' },
        output_data: { text: "I will look up the customer's order and process the refund request." },
      },
    ],
  };
}
