/**
 * Tools over the session's uploaded schedule.
 *
 * Both receive the conversation id as `session_id`, injected by the
 * executor; the model never supplies it.
 */

import { getRetrievalEngine } from '../retrieval/index.js';
import type { ToolDefinition } from './types.js';
import { stringField } from './utils.js';

export const NO_SESSION_CONTEXT = 'No session context.';

export const ragSearch: ToolDefinition = {
  tool: {
    name: 'rag_search',
    description:
      "Semantic search over the user's uploaded conference schedule. " +
      'Use this to find talks/sessions by topic, track, or keyword. ' +
      'Returns matching sessions with title, room, time, and excerpt.',
    input_schema: {
      type: 'object' as const,
      properties: {
        query: {
          type: 'string',
          description:
            "Search query (e.g. 'RAG', 'machine learning', 'keynote') to find relevant sessions in the schedule.",
        },
      },
      required: ['query'],
    },
  },
  requiresSession: true,
  handler: async (input) => {
    const sessionId = stringField(input, 'session_id');
    if (!sessionId) {
      return NO_SESSION_CONTEXT;
    }
    return getRetrievalEngine().query(sessionId, stringField(input, 'query'));
  },
};

export const getScheduleOverview: ToolDefinition = {
  tool: {
    name: 'get_schedule_overview',
    description:
      "Retrieve the full schedule overview for the user's uploaded conference. " +
      'Returns a compact list of all sessions (title, time, room, track) so you can see the whole program at a glance. ' +
      'Call this when you need the full schedule structure; use rag_search for topic-specific sessions.',
    input_schema: {
      type: 'object' as const,
      properties: {},
    },
  },
  requiresSession: true,
  handler: async (input) => {
    const sessionId = stringField(input, 'session_id');
    if (!sessionId) {
      return NO_SESSION_CONTEXT;
    }
    return getRetrievalEngine().overview(sessionId);
  },
};
