/**
 * Conversation Orchestrator
 *
 * Owns the phase state machine for one conversation turn:
 * 1. Gate the user message through the input guardrail
 * 2. Intake until there is something to plan
 * 3. Plan, then execute every task in order until each is terminal
 * 4. Gate the synthesized schedule through the output guardrail
 *
 * Exactly one checkpoint is written after every agent invocation and after
 * an input rejection. Errors thrown by agents propagate and abort the turn.
 */

import type { Agent } from '../executor/types.js';
import type { Guardrail } from '../services/guardrails/index.js';
import { createLogger, createRunId, getLogContext, withLogContext } from '../utils/observability/index.js';
import type { TraceLogger } from '../utils/trace-logger.js';
import { CheckpointLog } from './checkpoints.js';
import type { ProgressChannel } from './progress.js';
import {
  appendInteraction,
  buildPlan,
  isTerminal,
  startTask,
  toPlanSnapshot,
} from './state.js';
import type { AgentState, StateCheckpoint, Task } from './types.js';

const logger = createLogger({ domain: 'orchestrator' });

export const STATUS_UNDERSTANDING = 'Understanding your request…';
export const STATUS_PLANNING = 'Planning your schedule…';

export function executingStatus(task: Task): string {
  return `Executing task ${task.id}: ${task.description}`;
}

export interface OrchestratorDeps {
  intake: Agent;
  planning: Agent;
  executor: Agent<[task: Task]>;
  guardrail: Guardrail;
  progress?: ProgressChannel;
  trace?: TraceLogger;
  /** stepIndex of the first checkpoint written by this orchestrator */
  checkpointStart?: number;
}

export class ConversationOrchestrator {
  private readonly checkpoints: CheckpointLog;

  constructor(private readonly deps: OrchestratorDeps) {
    this.checkpoints = new CheckpointLog(deps.checkpointStart ?? 0);
  }

  /**
   * Run one turn for a user message. Resolves to the updated state.
   * Reuses the caller's runId when one is in the log context.
   */
  async runStep(state: AgentState, userMessage: string): Promise<AgentState> {
    const runId = getLogContext().runId ?? createRunId();
    return withLogContext({ runId, conversationId: state.conversationId }, () =>
      this.runTurn(state, userMessage)
    );
  }

  getCheckpoints(): StateCheckpoint[] {
    return this.checkpoints.list();
  }

  getStateAtStep(stepIndex: number): AgentState | null {
    return this.checkpoints.stateAt(stepIndex);
  }

  private async runTurn(initial: AgentState, userMessage: string): Promise<AgentState> {
    const { intake, planning, executor, guardrail, trace } = this.deps;
    let state = initial;

    appendInteraction(state, 'user', userMessage);
    logger.info('turn_started', { historyLength: state.interactionHistory.length });

    const inputVerdict = await guardrail.checkInput(userMessage);
    if (!inputVerdict.allowed) {
      appendInteraction(state, 'assistant', inputVerdict.message);
      this.checkpoints.append(state, null, { event: 'input_rejected' });
      trace?.phase('guardrail', 'Input rejected');
      logger.info('input_rejected');
      return state;
    }

    while (true) {
      if (!state.queryToPlan) {
        this.status(STATUS_UNDERSTANDING);
        trace?.phase('intake', 'Invoking intake');
        state = await intake.advance(state);
        this.checkpoints.append(state, intake.name);

        if (!state.queryToPlan) {
          logger.info('clarification_requested', {
            necessaryCount: state.necessaryDetailsRequired.length,
          });
          return state;
        }
        continue;
      }

      this.status(STATUS_PLANNING);
      trace?.phase('planning', 'Invoking planning');
      state = await planning.advance(state);
      this.checkpoints.append(state, planning.name);

      state.plan = buildPlan(state.planDescription);
      this.publishPlan(state);
      logger.info('plan_built', { taskCount: state.plan.length });

      for (let i = 0; i < state.plan.length; i++) {
        startTask(state.plan[i]);
        this.status(executingStatus(state.plan[i]));
        this.publishPlan(state);

        while (!isTerminal(state.plan[i].status)) {
          state = await executor.advance(state, state.plan[i]);
          this.checkpoints.append(state, executor.name, { taskId: state.plan[i].id });
        }

        logger.info('task_terminal', { taskId: state.plan[i].id, status: state.plan[i].status });
      }
      this.publishPlan(state);

      trace?.phase('synthesis', 'Checking synthesized schedule', {
        scheduleLength: state.synthesizedSchedule.length,
      });
      const outputVerdict = await guardrail.checkOutput(state.synthesizedSchedule);
      const reply = outputVerdict.allowed && state.synthesizedSchedule.trim()
        ? state.synthesizedSchedule
        : outputVerdict.message;
      appendInteraction(state, 'assistant', reply);

      logger.info('turn_complete', {
        outputAllowed: outputVerdict.allowed,
        replyLength: reply.length,
      });
      return state;
    }
  }

  private status(message: string): void {
    this.deps.progress?.publish({ type: 'status', message });
  }

  private publishPlan(state: AgentState): void {
    this.deps.progress?.publish({ type: 'plan', plan: toPlanSnapshot(state.plan) });
  }
}
