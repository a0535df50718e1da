/**
 * Single entry point for Claude requests made by agents.
 * Wraps the call with trace logging and timing.
 */

import type { Message, MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { getClient } from '../services/anthropic/client.js';
import type { AgentRunContext } from './types.js';

export async function requestCompletion(
  label: string,
  params: MessageCreateParamsNonStreaming & { system: string },
  context: AgentRunContext = {}
): Promise<Message> {
  context.trace?.llmRequest(label, params);

  const startTime = Date.now();
  const response = await getClient().messages.create(params);
  context.trace?.llmResponse(label, response, Date.now() - startTime);

  return response;
}
