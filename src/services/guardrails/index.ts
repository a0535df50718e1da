/**
 * Guardrails
 *
 * LLM allow/deny classifier for user input and assistant output.
 * Classifier failures fail open; a reply the classifier cannot be read
 * from is treated as a rejection.
 */

import config from '../../config.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { getClient } from '../anthropic/client.js';
import { extractText, parseJsonObject } from '../anthropic/structured.js';

const logger = createLogger({ domain: 'guardrails' });

export const INPUT_REJECT_MESSAGE = 'Please keep your message on the topic of conference schedule planning.';
export const OUTPUT_REJECT_MESSAGE = "I can't provide that. How can I help with your conference schedule?";

/** Characters of text sent to the classifier */
const CLASSIFY_LIMIT = 2000;

export const GUARDRAIL_PROMPT = `You classify messages for a conference schedule planning assistant.

Allow (true): anything on-topic (schedules, talks, venues, food and travel around the conference, planning), greetings, small talk, thanks, or harmless conversation openers.
Reject (false) only: harmful or abusive content, or messages that are clearly off-topic and cannot lead to schedule help (e.g. recipe requests, sports scores).
When in doubt, allow.

A "Message:" is written by the user. A "Reply:" is written by the assistant; reject it only if it is harmful or abusive.

Respond with ONLY a JSON object: {"allowed": true|false, "message": "<short reason>"}`;

export interface GuardrailVerdict {
  allowed: boolean;
  /** Text to show in place of the checked text when it is not allowed */
  message: string;
}

export interface Guardrail {
  checkInput(text: string): Promise<GuardrailVerdict>;
  checkOutput(text: string): Promise<GuardrailVerdict>;
}

type Direction = 'input' | 'output';

export class ClaudeGuardrail implements Guardrail {
  constructor(private readonly model: string = config.models.guardrail) {}

  async checkInput(text: string): Promise<GuardrailVerdict> {
    if (!text.trim()) {
      return { allowed: false, message: INPUT_REJECT_MESSAGE };
    }
    return this.classify('input', `Message: ${text.slice(0, CLASSIFY_LIMIT)}`, INPUT_REJECT_MESSAGE);
  }

  async checkOutput(text: string): Promise<GuardrailVerdict> {
    if (!text.trim()) {
      return { allowed: true, message: OUTPUT_REJECT_MESSAGE };
    }
    return this.classify('output', `Reply: ${text.slice(0, CLASSIFY_LIMIT)}`, OUTPUT_REJECT_MESSAGE);
  }

  private async classify(direction: Direction, content: string, rejectMessage: string): Promise<GuardrailVerdict> {
    const startTime = Date.now();
    let text: string;
    try {
      const response = await getClient().messages.create({
        model: this.model,
        max_tokens: 256,
        system: GUARDRAIL_PROMPT,
        messages: [{ role: 'user', content }],
      });
      text = extractText(response);
    } catch (error) {
      logger.warn('guardrail_unavailable', { direction, error: errorMessage(error) });
      return { allowed: true, message: rejectMessage };
    }

    const parsed = parseJsonObject(text);
    // Boundary: validate shape before use
    const allowed = parsed !== null && parsed.allowed === true;

    logger.info('guardrail_checked', {
      direction,
      allowed,
      durationMs: Date.now() - startTime,
    });

    return { allowed, message: rejectMessage };
  }
}

let instance: ClaudeGuardrail | null = null;

export function getGuardrail(): Guardrail {
  if (!instance) {
    instance = new ClaudeGuardrail();
  }
  return instance;
}
