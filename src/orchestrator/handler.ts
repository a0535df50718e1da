/**
 * Orchestrator Handler
 *
 * Integration layer between the orchestrator and the session store.
 * Single path for running one user turn:
 * 1. Rehydrate agent state from persisted history and plan
 * 2. Run the orchestrator with a fresh set of agents
 * 3. Persist the new messages, plan and checkpoints
 *
 * A failed turn leaves history and plan as they were; the
 * checkpoints it wrote and its run log are still kept.
 */

import { createAgents } from '../agents/index.js';
import type { Agent, AgentRunContext } from '../executor/types.js';
import { getGuardrail, type Guardrail } from '../services/guardrails/index.js';
import { getSessionStore, type SessionStore } from '../services/session/index.js';
import {
  AppError,
  SessionLockedError,
  SessionNotFoundError,
  errorMessage,
} from '../utils/errors.js';
import {
  createLogger,
  createRunId,
  withLogContext,
  withRunLog,
  type RunLogCollector,
} from '../utils/observability/index.js';
import { createTraceLogger } from '../utils/trace-logger.js';
import { ConversationOrchestrator } from './orchestrate.js';
import type { ProgressChannel } from './progress.js';
import {
  createAgentState,
  fromPlanSnapshot,
  isScheduleComplete,
  toPlanSnapshot,
} from './state.js';
import type { AgentState, PlanSnapshot, Task } from './types.js';

const logger = createLogger({ domain: 'turn-handler' });

export interface TurnAgents {
  intake: Agent;
  planning: Agent;
  executor: Agent<[task: Task]>;
}

export interface HandleTurnOptions {
  store?: SessionStore;
  guardrail?: Guardrail;
  progress?: ProgressChannel;
  /** Builds the agents for this turn; defaults to the model-backed agents */
  agentFactory?: (context: AgentRunContext) => TurnAgents;
}

export interface TurnResult {
  reply: string;
  plan: PlanSnapshot;
  state: AgentState;
  scheduleComplete: boolean;
}

/**
 * Build agent state from what the store holds for a session.
 * Only history and plan carry over; every turn starts at intake with
 * an empty query, so the new message is always read.
 */
export async function rehydrateState(store: SessionStore, sessionId: string): Promise<AgentState> {
  const [history, plan] = await Promise.all([store.getHistory(sessionId), store.getPlan(sessionId)]);

  const state = createAgentState(sessionId);
  state.interactionHistory = history;
  state.plan = fromPlanSnapshot(plan);
  return state;
}

function lastAssistantMessage(state: AgentState): string {
  for (let i = state.interactionHistory.length - 1; i >= 0; i--) {
    const interaction = state.interactionHistory[i];
    if (interaction.role === 'assistant') return interaction.content;
  }
  return '';
}

/**
 * Run one user turn for a session and persist the outcome.
 */
export async function handleTurn(
  sessionId: string,
  userMessage: string,
  options: HandleTurnOptions = {}
): Promise<TurnResult> {
  const store = options.store ?? getSessionStore();

  const session = await store.getSession(sessionId);
  if (!session) {
    throw new SessionNotFoundError(sessionId);
  }
  if (session.scheduleComplete) {
    throw new SessionLockedError(sessionId);
  }

  const runId = createRunId();
  const trace = createTraceLogger(runId, sessionId);
  const runLog: RunLogCollector = { lines: [] };

  trace.log('INFO', 'Incoming message', { Session: sessionId, Message: userMessage });

  const state = await rehydrateState(store, sessionId);
  const previousLength = state.interactionHistory.length;
  const agentFactory = options.agentFactory ?? ((context: AgentRunContext) => createAgents(context));

  const orchestrator = new ConversationOrchestrator({
    ...agentFactory({ trace }),
    guardrail: options.guardrail ?? getGuardrail(),
    progress: options.progress,
    trace,
    checkpointStart: await store.nextStepIndex(sessionId),
  });

  return withLogContext({ runId, conversationId: sessionId }, () =>
    withRunLog(runLog, async () => {
      try {
        const finalState = await orchestrator.runStep(state, userMessage);
        const plan = toPlanSnapshot(finalState.plan);
        const scheduleComplete = isScheduleComplete(finalState);

        await store.addMessages(sessionId, finalState.interactionHistory.slice(previousLength));
        await store.savePlan(sessionId, plan);
        if (scheduleComplete) {
          await store.setScheduleComplete(sessionId, true);
        }

        logger.info('turn_persisted', {
          count: finalState.interactionHistory.length - previousLength,
          taskCount: plan.length,
          scheduleComplete,
        });
        trace.close('SUCCESS');

        return {
          reply: lastAssistantMessage(finalState),
          plan,
          state: finalState,
          scheduleComplete,
        };
      } catch (error) {
        logger.error('turn_failed', {
          error: errorMessage(error),
          code: error instanceof AppError ? error.code : undefined,
        });
        trace.log('ERROR', 'Turn failed', { Error: errorMessage(error) });
        trace.close('FAILED');
        throw error;
      } finally {
        await store.appendCheckpoints(sessionId, orchestrator.getCheckpoints());
        await store.saveRunLog(sessionId, runLog.lines);
      }
    })
  );
}
