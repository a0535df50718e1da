/**
 * Planning Agent
 *
 * Turns the intake summary into an ordered list of task descriptions.
 * Task ids are positional and assigned by the orchestrator.
 */

import config from '../../config.js';
import { requestCompletion } from '../../executor/model.js';
import type { Agent, AgentRunContext } from '../../executor/types.js';
import type { AgentState } from '../../orchestrator/types.js';
import { extractText, parseJsonObject, stringList } from '../../services/anthropic/structured.js';
import { LlmRefusalError, StructuredOutputError } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { PLANNING_AGENT_PROMPT, PLANNING_INPUT_TEMPLATE } from './prompt.js';

const logger = createLogger({ domain: 'planning-agent' });

const MAX_TOKENS = 2048;

/**
 * Read `{ plan_description: string[] }`.
 * Entries are trimmed and blank ones dropped.
 */
export function parsePlanDescription(text: string): string[] {
  const parsed = parseJsonObject(text);
  // Boundary: validate shape before use
  if (!parsed || !Array.isArray(parsed.plan_description)) {
    throw new StructuredOutputError('planning', 'missing plan_description array', {
      text: text.slice(0, 200),
    });
  }
  return stringList(parsed.plan_description);
}

export class PlanningAgent implements Agent {
  readonly name = 'planning';

  constructor(
    private readonly context: AgentRunContext = {},
    private readonly model: string = config.models.planner
  ) {}

  async advance(state: AgentState): Promise<AgentState> {
    const response = await requestCompletion(
      'planning',
      {
        model: this.model,
        max_tokens: MAX_TOKENS,
        system: PLANNING_AGENT_PROMPT,
        messages: [
          { role: 'user', content: PLANNING_INPUT_TEMPLATE.replace('{request}', () => state.queryToPlan) },
        ],
      },
      this.context
    );

    const text = extractText(response);
    if (!text) {
      throw new LlmRefusalError('planning', { stopReason: response.stop_reason });
    }

    state.planDescription = parsePlanDescription(text);

    logger.info('plan_described', { taskCount: state.planDescription.length });
    this.context.trace?.phase('planning', 'Plan described', {
      tasks: state.planDescription,
    });

    return state;
  }
}
