import { REFUND_GOAL, type DemoRun } from './types.js';

/** The knowledge-base search keeps returning nothing and the agent keeps retrying. */
export function toolLoop(): DemoRun {
  const search = {
    action_type: 'tool_call',
    action_name: 'search_kb',
    token_count: 40,
    duration_ms: 150,
    input_data: { query: 'refund policy order 4821' },
    output_data: { results: [] },
  };

  return {
    label: 'stuck in a search loop',
    goal: REFUND_GOAL,
    events: [
      {
        action_type: 'model_request',
        action_name: 'plan',
        token_count: 310,
        duration_ms: 800,
        output_data: { text: "I will look up the customer's order and process the refund request." },
      },
      ...Array.from({ length: 6 }, () => ({ ...search })),
    ],
  };
}
