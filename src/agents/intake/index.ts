/**
 * Intake Agent
 *
 * Reads the whole conversation and either asks the user for missing
 * details or hands a summary to planning.
 */

import type { MessageParam } from '@anthropic-ai/sdk/resources/messages';
import config from '../../config.js';
import { requestCompletion } from '../../executor/model.js';
import type { Agent, AgentRunContext } from '../../executor/types.js';
import type { AgentState, Interaction } from '../../orchestrator/types.js';
import { appendInteraction } from '../../orchestrator/state.js';
import { extractText, parseJsonObject, stringList } from '../../services/anthropic/structured.js';
import { LlmRefusalError, StructuredOutputError } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { DEFAULT_CLARIFICATION, INTAKE_AGENT_PROMPT } from './prompt.js';

const logger = createLogger({ domain: 'intake-agent' });

const MAX_TOKENS = 1024;

/** Marker used when the model asks to clarify but names nothing. */
export const NEED_MORE = 'need_more';

export type IntakeDecision =
  | {
      action: 'clarify';
      necessaryDetails: string[];
      optionalDetails: string[];
      userMessage: string;
    }
  | { action: 'plan'; summary: string };

/**
 * Convert history to alternating API messages.
 * Leading assistant turns are dropped; consecutive turns of one role are joined.
 */
export function toConversationMessages(history: Interaction[]): MessageParam[] {
  const messages: Array<{ role: Interaction['role']; content: string }> = [];
  for (const { role, content } of history) {
    if (messages.length === 0 && role === 'assistant') continue;
    const last = messages[messages.length - 1];
    if (last && last.role === role) {
      last.content = `${last.content}\n\n${content}`;
    } else {
      messages.push({ role, content });
    }
  }
  return messages;
}

/**
 * Validate the intake answer.
 * `optional_details` and `optional_details_required` are the same field.
 */
export function parseIntakeDecision(text: string): IntakeDecision {
  const parsed = parseJsonObject(text);
  // Boundary: validate shape before use
  if (!parsed) {
    throw new StructuredOutputError('intake', 'not a JSON object', { text: text.slice(0, 200) });
  }

  if (parsed.action === 'plan') {
    const summary = typeof parsed.summary === 'string' ? parsed.summary.trim() : '';
    if (!summary) {
      throw new StructuredOutputError('intake', 'plan without summary');
    }
    return { action: 'plan', summary };
  }

  if (parsed.action === 'clarify') {
    const necessary = stringList(parsed.necessary_details_required);
    const optional = Array.isArray(parsed.optional_details)
      ? stringList(parsed.optional_details)
      : stringList(parsed.optional_details_required);
    const userMessage = typeof parsed.user_message === 'string' ? parsed.user_message.trim() : '';
    return {
      action: 'clarify',
      necessaryDetails: necessary.length > 0 ? necessary : [NEED_MORE],
      optionalDetails: optional,
      userMessage: userMessage || DEFAULT_CLARIFICATION,
    };
  }

  throw new StructuredOutputError('intake', `unknown action ${JSON.stringify(parsed.action)}`);
}

export class IntakeAgent implements Agent {
  readonly name = 'intake';

  constructor(
    private readonly context: AgentRunContext = {},
    private readonly model: string = config.models.intake
  ) {}

  async advance(state: AgentState): Promise<AgentState> {
    const response = await requestCompletion(
      'intake',
      {
        model: this.model,
        max_tokens: MAX_TOKENS,
        system: INTAKE_AGENT_PROMPT,
        messages: toConversationMessages(state.interactionHistory),
      },
      this.context
    );

    const text = extractText(response);
    if (!text) {
      throw new LlmRefusalError('intake', { stopReason: response.stop_reason });
    }

    const decision = parseIntakeDecision(text);

    if (decision.action === 'clarify') {
      state.necessaryDetailsRequired = decision.necessaryDetails;
      state.optionalDetails = decision.optionalDetails;
      state.queryToPlan = '';
      appendInteraction(state, 'assistant', decision.userMessage);
      logger.info('intake_clarify', {
        necessaryCount: decision.necessaryDetails.length,
        optionalCount: decision.optionalDetails.length,
      });
    } else {
      state.necessaryDetailsRequired = [];
      state.optionalDetails = [];
      state.queryToPlan = decision.summary;
      logger.info('intake_plan', { summaryLength: decision.summary.length });
    }

    return state;
  }
}
