/**
 * Tool Executor
 *
 * Runs one registered tool call: parse and validate the arguments,
 * inject the session id where the tool needs it, invoke the handler.
 * Failures surface as recoverable AppErrors for the caller to record.
 */

import { ToolArgumentsError, UnknownToolError } from '../utils/errors.js';
import { isRecord } from '../utils/json.js';
import { createLogger } from '../utils/observability/index.js';
import type { ToolRegistry } from '../tools/index.js';
import type { ToolContext, ToolInput } from '../tools/types.js';
import { validateInput } from '../tools/utils.js';
import type { ToolCallRequest } from '../orchestrator/types.js';

const logger = createLogger({ domain: 'tool-executor' });

/**
 * Parse JSON-encoded tool arguments.
 * An empty string is read as no arguments.
 */
export function parseToolArguments(call: ToolCallRequest): ToolInput {
  if (!call.arguments.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(call.arguments);
  } catch (error) {
    throw new ToolArgumentsError(call.name, error instanceof Error ? error.message : String(error));
  }

  // Boundary: validate shape before use
  if (!isRecord(parsed)) {
    throw new ToolArgumentsError(call.name, 'arguments must be a JSON object');
  }
  return parsed;
}

/**
 * Execute a registered tool and return its output for the model.
 */
export async function executeTool(
  registry: ToolRegistry,
  call: ToolCallRequest,
  context: ToolContext
): Promise<string> {
  const definition = registry.get(call.name);
  if (!definition) {
    throw new UnknownToolError(call.name);
  }

  const args = parseToolArguments(call);
  const invalid = validateInput(args, definition.tool.input_schema);
  if (invalid) {
    throw new ToolArgumentsError(call.name, invalid);
  }

  const input = definition.requiresSession
    ? { ...args, session_id: context.conversationId }
    : args;

  logger.info('tool_call', {
    toolName: call.name,
    inputKeys: Object.keys(args),
  });

  const startTime = Date.now();
  const output = await definition.handler(input, context);

  logger.info('tool_result', {
    toolName: call.name,
    durationMs: Date.now() - startTime,
    outputLength: output.length,
  });

  return output;
}
