import type { RecordEventInput } from '../../models/types.js';

/** One scripted run: its goal and the events to record, in order. */
export interface DemoRun {
  label: string;
  goal: string;
  events: RecordEventInput[];
}

export const REFUND_GOAL = "Process the customer's refund request for their order";
