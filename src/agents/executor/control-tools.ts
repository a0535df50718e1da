/**
 * Tools the executor handles itself rather than through the registry.
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';

export const SUBMIT_TASK_RESULT = 'submit_task_result';
export const GENERATE_SCHEDULE = 'generate_schedule';

export const CONTROL_TOOLS: Tool[] = [
  {
    name: SUBMIT_TASK_RESULT,
    description:
      'Call this when the current task is fully complete. Pass the complete result so later tasks can use it. ' +
      'Plain text does not finish a task; you must call this tool.',
    input_schema: {
      type: 'object' as const,
      properties: {
        result: {
          type: 'string',
          description: 'The full task result (all gathered information).',
        },
      },
      required: ['result'],
    },
  },
  {
    name: GENERATE_SCHEDULE,
    description:
      'Generate a personal schedule for the user from the information gathered so far. ' +
      'Can be called multiple times to refine the schedule.',
    input_schema: {
      type: 'object' as const,
      properties: {},
    },
  },
];
