import { describe, it, expect, vi } from 'vitest';
import type { Agent } from '../../../src/executor/types.js';
import {
  ConversationOrchestrator,
  STATUS_PLANNING,
  STATUS_UNDERSTANDING,
} from '../../../src/orchestrator/orchestrate.js';
import { ProgressChannel } from '../../../src/orchestrator/progress.js';
import { appendInteraction, completeTask, createAgentState, failTask } from '../../../src/orchestrator/state.js';
import type { AgentState, Task } from '../../../src/orchestrator/types.js';
import type { Guardrail } from '../../../src/services/guardrails/index.js';
import { StructuredOutputError } from '../../../src/utils/errors.js';

const allowAll: Guardrail = {
  checkInput: vi.fn(async () => ({ allowed: true, message: 'input rejected' })),
  checkOutput: vi.fn(async () => ({ allowed: true, message: 'output fallback' })),
};

function agent(name: string, advance: (state: AgentState) => AgentState): Agent {
  return { name, advance: vi.fn(async (state: AgentState) => advance(state)) };
}

function executorAgent(advance: (state: AgentState, task: Task) => AgentState): Agent<[task: Task]> {
  return {
    name: 'executor',
    advance: vi.fn(async (state: AgentState, task: Task) => advance(state, task)),
  };
}

const planningIntake = agent('intake', (state) => {
  state.queryToPlan = 'AI talks at the developer conference';
  return state;
});

const clarifyingIntake = agent('intake', (state) => {
  state.necessaryDetailsRequired = ['conference'];
  appendInteraction(state, 'assistant', 'Which conference?');
  return state;
});

const twoTaskPlanning = agent('planning', (state) => {
  state.planDescription = ['Find AI talks', 'Build itinerary'];
  return state;
});

/** Completes each task on its first invocation and writes a schedule on the last. */
const completingExecutor = executorAgent((state, task) => {
  completeTask(task, `result ${task.id}`);
  state.synthesizedSchedule = `schedule after task ${task.id}`;
  return state;
});

describe('ConversationOrchestrator', () => {
  it('asks for clarification and stops after intake', async () => {
    const planning = agent('planning', (state) => state);
    const executor = executorAgent((state) => state);
    const orchestrator = new ConversationOrchestrator({
      intake: clarifyingIntake,
      planning,
      executor,
      guardrail: allowAll,
    });

    const state = await orchestrator.runStep(createAgentState('conv-1'), 'hi');

    expect(state.interactionHistory).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Which conference?' },
    ]);
    expect(state.plan).toEqual([]);
    expect(planning.advance).not.toHaveBeenCalled();
    expect(executor.advance).not.toHaveBeenCalled();
    expect(orchestrator.getCheckpoints().map((checkpoint) => checkpoint.agentName)).toEqual(['intake']);
  });

  it('runs intake, planning and every task in order', async () => {
    const order: number[] = [];
    const executor = executorAgent((state, task) => {
      order.push(task.id);
      completeTask(task, `result ${task.id}`);
      state.synthesizedSchedule = `schedule after task ${task.id}`;
      return state;
    });
    const orchestrator = new ConversationOrchestrator({
      intake: planningIntake,
      planning: twoTaskPlanning,
      executor,
      guardrail: allowAll,
    });

    const state = await orchestrator.runStep(createAgentState('conv-1'), 'Plan my day');

    expect(order).toEqual([0, 1]);
    expect(state.plan.map((task) => [task.id, task.status, task.result])).toEqual([
      [0, 'completed', 'result 0'],
      [1, 'completed', 'result 1'],
    ]);
    expect(state.interactionHistory[state.interactionHistory.length - 1]).toEqual({
      role: 'assistant',
      content: 'schedule after task 1',
    });
  });

  it('writes one checkpoint per agent invocation with increasing step index', async () => {
    let calls = 0;
    const executor = executorAgent((state, task) => {
      calls++;
      // Task 0 needs two invocations
      if (task.id === 0 && calls === 1) return state;
      completeTask(task, 'ok');
      state.synthesizedSchedule = 'schedule';
      return state;
    });
    const orchestrator = new ConversationOrchestrator({
      intake: planningIntake,
      planning: twoTaskPlanning,
      executor,
      guardrail: allowAll,
      checkpointStart: 3,
    });

    await orchestrator.runStep(createAgentState('conv-1'), 'Plan my day');
    const checkpoints = orchestrator.getCheckpoints();

    expect(checkpoints.map((checkpoint) => checkpoint.stepIndex)).toEqual([3, 4, 5, 6, 7]);
    expect(checkpoints.map((checkpoint) => checkpoint.agentName)).toEqual([
      'intake',
      'planning',
      'executor',
      'executor',
      'executor',
    ]);
    expect(checkpoints.map((checkpoint) => checkpoint.metadata)).toEqual([{}, {}, { taskId: 0 }, { taskId: 0 }, { taskId: 1 }]);
    expect(orchestrator.getStateAtStep(5)?.plan[0].status).toBe('in_progress');
    expect(orchestrator.getStateAtStep(6)?.plan[0].status).toBe('completed');
  });

  it('returns an independent mutable copy of the state at a step', async () => {
    const orchestrator = new ConversationOrchestrator({
      intake: clarifyingIntake,
      planning: agent('planning', (state) => state),
      executor: executorAgent((state) => state),
      guardrail: allowAll,
      checkpointStart: 2,
    });
    await orchestrator.runStep(createAgentState('conv-1'), 'hi');

    const copy = orchestrator.getStateAtStep(2);
    expect(copy).toEqual(orchestrator.getCheckpoints()[0].state);
    expect(Object.isFrozen(copy)).toBe(false);

    copy?.interactionHistory.push({ role: 'user', content: 'edited' });
    if (copy) copy.queryToPlan = 'edited';

    const again = orchestrator.getStateAtStep(2);
    expect(again?.interactionHistory).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Which conference?' },
    ]);
    expect(again?.queryToPlan).toBe('');
    expect(orchestrator.getStateAtStep(0)).toBeNull();
    expect(orchestrator.getStateAtStep(3)).toBeNull();
  });

  it('skips intake when a query is already planned', async () => {
    const intake = agent('intake', (state) => state);
    const orchestrator = new ConversationOrchestrator({
      intake,
      planning: twoTaskPlanning,
      executor: completingExecutor,
      guardrail: allowAll,
    });
    const initial = createAgentState('conv-1');
    initial.queryToPlan = 'already summarized';

    await orchestrator.runStep(initial, 'Also add lunch');

    expect(intake.advance).not.toHaveBeenCalled();
    expect(orchestrator.getCheckpoints()[0].agentName).toBe('planning');
  });

  it('replaces any previous plan', async () => {
    const orchestrator = new ConversationOrchestrator({
      intake: planningIntake,
      planning: agent('planning', (state) => {
        state.planDescription = ['Only task'];
        return state;
      }),
      executor: completingExecutor,
      guardrail: allowAll,
    });
    const initial = createAgentState('conv-1');
    initial.queryToPlan = 'summary';
    initial.plan = [
      { id: 0, description: 'old', status: 'completed', executionHistory: [], result: 'old' },
      { id: 1, description: 'old 2', status: 'completed', executionHistory: [], result: 'old' },
    ];

    const state = await orchestrator.runStep(initial, 'again');

    expect(state.plan.map((task) => task.description)).toEqual(['Only task']);
  });

  it('continues the plan after a failed task', async () => {
    const executor = executorAgent((state, task) => {
      if (task.id === 0) {
        failTask(task);
      } else {
        completeTask(task, 'ok');
        state.synthesizedSchedule = 'schedule';
      }
      return state;
    });
    const orchestrator = new ConversationOrchestrator({
      intake: planningIntake,
      planning: twoTaskPlanning,
      executor,
      guardrail: allowAll,
    });

    const state = await orchestrator.runStep(createAgentState('conv-1'), 'Plan my day');

    expect(state.plan.map((task) => task.status)).toEqual(['failed', 'completed']);
  });

  it('stops on input rejection with only the rejection message', async () => {
    const intake = agent('intake', (state) => state);
    const guardrail: Guardrail = {
      checkInput: vi.fn(async () => ({ allowed: false, message: 'Please stay on topic.' })),
      checkOutput: vi.fn(async () => ({ allowed: true, message: '' })),
    };
    const orchestrator = new ConversationOrchestrator({
      intake,
      planning: twoTaskPlanning,
      executor: completingExecutor,
      guardrail,
    });

    const state = await orchestrator.runStep(createAgentState('conv-1'), 'write me a poem');

    expect(state.interactionHistory).toEqual([
      { role: 'user', content: 'write me a poem' },
      { role: 'assistant', content: 'Please stay on topic.' },
    ]);
    expect(intake.advance).not.toHaveBeenCalled();
    const checkpoints = orchestrator.getCheckpoints();
    expect(checkpoints).toHaveLength(1);
    expect(checkpoints[0].agentName).toBeNull();
    expect(checkpoints[0].metadata).toEqual({ event: 'input_rejected' });
  });

  it('substitutes the guardrail message for a rejected schedule', async () => {
    const guardrail: Guardrail = {
      checkInput: vi.fn(async () => ({ allowed: true, message: '' })),
      checkOutput: vi.fn(async () => ({ allowed: false, message: 'Cannot share that.' })),
    };
    const orchestrator = new ConversationOrchestrator({
      intake: planningIntake,
      planning: twoTaskPlanning,
      executor: completingExecutor,
      guardrail,
    });

    const state = await orchestrator.runStep(createAgentState('conv-1'), 'Plan my day');

    expect(guardrail.checkOutput).toHaveBeenCalledWith('schedule after task 1');
    expect(state.interactionHistory[state.interactionHistory.length - 1].content).toBe('Cannot share that.');
    expect(state.synthesizedSchedule).toBe('schedule after task 1');
  });

  it('replies with the guardrail message when no schedule was produced', async () => {
    const executor = executorAgent((state, task) => {
      completeTask(task, 'ok');
      return state;
    });
    const orchestrator = new ConversationOrchestrator({
      intake: planningIntake,
      planning: twoTaskPlanning,
      executor,
      guardrail: allowAll,
    });

    const state = await orchestrator.runStep(createAgentState('conv-1'), 'Plan my day');

    expect(state.interactionHistory[state.interactionHistory.length - 1].content).toBe('output fallback');
  });

  it('propagates agent errors without a checkpoint for the failed step', async () => {
    const planning: Agent = {
      name: 'planning',
      advance: vi.fn(async () => {
        throw new StructuredOutputError('planning', 'not a JSON object');
      }),
    };
    const orchestrator = new ConversationOrchestrator({
      intake: planningIntake,
      planning,
      executor: completingExecutor,
      guardrail: allowAll,
    });

    await expect(orchestrator.runStep(createAgentState('conv-1'), 'Plan my day')).rejects.toThrow(
      StructuredOutputError
    );
    expect(orchestrator.getCheckpoints().map((checkpoint) => checkpoint.agentName)).toEqual(['intake']);
  });

  it('publishes status and plan progress events', async () => {
    const progress = new ProgressChannel();
    const orchestrator = new ConversationOrchestrator({
      intake: planningIntake,
      planning: twoTaskPlanning,
      executor: completingExecutor,
      guardrail: allowAll,
      progress,
    });

    await orchestrator.runStep(createAgentState('conv-1'), 'Plan my day');
    const events = progress.drain();

    const statuses = events.flatMap((event) => (event.type === 'status' ? [event.message] : []));
    expect(statuses).toEqual([
      STATUS_UNDERSTANDING,
      STATUS_PLANNING,
      'Executing task 0: Find AI talks',
      'Executing task 1: Build itinerary',
    ]);

    const plans = events.flatMap((event) => (event.type === 'plan' ? [event.plan] : []));
    expect(plans[0].map((entry) => entry.status)).toEqual(['pending', 'pending']);
    expect(plans[1].map((entry) => entry.status)).toEqual(['in_progress', 'pending']);
    expect(plans[plans.length - 1].map((entry) => entry.status)).toEqual(['completed', 'completed']);
  });
});
