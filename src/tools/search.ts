/**
 * Web and places search tools.
 */

import { getSearchClient } from '../services/search/serper.js';
import type { ToolDefinition } from './types.js';
import { stringField } from './utils.js';

export const googleWebSearch: ToolDefinition = {
  tool: {
    name: 'google_web_search',
    description: 'Searches for information on the web.',
    input_schema: {
      type: 'object' as const,
      properties: {
        query: {
          type: 'string',
          description: 'Search query for information on the web.',
        },
      },
      required: ['query'],
    },
  },
  handler: async (input) => {
    return getSearchClient().webSearch(stringField(input, 'query'));
  },
};

export const googlePlacesSearch: ToolDefinition = {
  tool: {
    name: 'google_places_search',
    description: 'Finds places, venues, or restaurants.',
    input_schema: {
      type: 'object' as const,
      properties: {
        query: {
          type: 'string',
          description: 'Search query for places, venues, or restaurants.',
        },
      },
      required: ['query'],
    },
  },
  handler: async (input) => {
    return getSearchClient().placesSearch(stringField(input, 'query'));
  },
};
