/**
 * Tool registry (canonical).
 *
 * Built once at startup and validated: names are unique and every input
 * schema is a JSON object schema.
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import { AppError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type { ToolDefinition } from './types.js';
import { googlePlacesSearch, googleWebSearch } from './search.js';
import { getScheduleOverview, ragSearch } from './schedule.js';

const logger = createLogger({ domain: 'tools' });

/**
 * All tool definitions available to the executor.
 */
const allTools: ToolDefinition[] = [
  // Schedule
  getScheduleOverview,
  ragSearch,
  // Search
  googleWebSearch,
  googlePlacesSearch,
];

export class ToolRegistry {
  private readonly definitions = new Map<string, ToolDefinition>();

  constructor(definitions: ToolDefinition[]) {
    for (const definition of definitions) {
      const { name, input_schema } = definition.tool;
      if (this.definitions.has(name)) {
        throw new AppError(`Duplicate tool name: ${name}`, 'tool_registry_invalid', false, { name });
      }
      if (input_schema.type !== 'object') {
        throw new AppError(`Tool ${name} schema must have type "object"`, 'tool_registry_invalid', false, { name });
      }
      this.definitions.set(name, definition);
    }
  }

  /** Tool definitions for the Anthropic API, in registration order. */
  tools(): Tool[] {
    return [...this.definitions.values()].map((definition) => definition.tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.definitions.get(name);
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }
}

let registry: ToolRegistry | null = null;

export function getToolRegistry(): ToolRegistry {
  if (!registry) {
    registry = new ToolRegistry(allTools);
    logger.info('tool_registry_built', { count: registry.names().length, tools: registry.names() });
  }
  return registry;
}

export type { ToolDefinition, ToolHandler, ToolContext, ToolInput } from './types.js';
