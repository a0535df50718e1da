/**
 * Tool type definitions (canonical location).
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';

/**
 * Context passed to tool handlers.
 */
export interface ToolContext {
  conversationId: string;
}

export type ToolInput = Record<string, unknown>;

/**
 * Handler function type for tool execution.
 * The returned string is handed to the model as the tool result.
 */
export type ToolHandler = (
  input: ToolInput,
  context: ToolContext
) => Promise<string>;

/**
 * Pairs a tool definition with its handler.
 */
export interface ToolDefinition {
  tool: Tool;
  handler: ToolHandler;
  /** Receive the conversation id as `session_id` in the input */
  requiresSession?: boolean;
}
