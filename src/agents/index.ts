/**
 * Agents Module
 *
 * The three reasoning steps of a turn. Each shares the Agent contract:
 * advance(state, ...) resolves to the mutated state.
 */

import type { AgentRunContext } from '../executor/types.js';
import { ExecutorAgent, type ExecutorAgentOptions } from './executor/index.js';
import { IntakeAgent } from './intake/index.js';
import { PlanningAgent } from './planning/index.js';

export type { Agent, AgentRunContext } from '../executor/types.js';
export { IntakeAgent } from './intake/index.js';
export { PlanningAgent } from './planning/index.js';
export { ExecutorAgent } from './executor/index.js';

export interface AgentSet {
  intake: IntakeAgent;
  planning: PlanningAgent;
  executor: ExecutorAgent;
}

/**
 * Build the agents for one turn, sharing the turn's run context.
 */
export function createAgents(context: AgentRunContext = {}, executorOptions: ExecutorAgentOptions = {}): AgentSet {
  return {
    intake: new IntakeAgent(context),
    planning: new PlanningAgent(context),
    executor: new ExecutorAgent(context, executorOptions),
  };
}
