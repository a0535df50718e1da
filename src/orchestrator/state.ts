/**
 * Agent state construction and task status transitions.
 *
 * Task status only moves forward: pending → in_progress → completed | failed.
 * Every transition goes through these helpers.
 */

import { InvalidTransitionError } from '../utils/errors.js';
import type { AgentState, Interaction, PlanSnapshot, Task, TaskStatus } from './types.js';

export function createAgentState(conversationId: string): AgentState {
  return {
    conversationId,
    necessaryDetailsRequired: [],
    optionalDetails: [],
    queryToPlan: '',
    planDescription: [],
    plan: [],
    synthesizedSchedule: '',
    interactionHistory: [],
  };
}

/** Deep copy with no shared references to the source. */
export function cloneState(state: AgentState): AgentState {
  return structuredClone(state);
}

/** Deep copy and freeze every nested object. */
export function freezeState(state: AgentState): Readonly<AgentState> {
  return deepFreeze(structuredClone(state));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function appendInteraction(state: AgentState, role: Interaction['role'], content: string): void {
  state.interactionHistory.push({ role, content });
}

/**
 * Build tasks from plan descriptions.
 * Ids are positional, 0..N-1.
 */
export function buildPlan(descriptions: string[]): Task[] {
  return descriptions.map((description, id): Task => ({
    id,
    description,
    status: 'pending',
    executionHistory: [],
    result: '',
  }));
}

export function isTerminal(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function startTask(task: Task): void {
  if (task.status !== 'pending') {
    throw new InvalidTransitionError(task.id, task.status, 'in_progress');
  }
  task.status = 'in_progress';
}

export function completeTask(task: Task, result: string): void {
  if (task.status !== 'in_progress') {
    throw new InvalidTransitionError(task.id, task.status, 'completed');
  }
  task.status = 'completed';
  task.result = result;
}

export function failTask(task: Task): void {
  if (task.status !== 'in_progress') {
    throw new InvalidTransitionError(task.id, task.status, 'failed');
  }
  task.status = 'failed';
}

export function toPlanSnapshot(plan: Task[]): PlanSnapshot {
  return plan.map(({ id, description, status, result }) => ({ id, description, status, result }));
}

/**
 * Restore tasks from a persisted snapshot.
 * Execution history is per-turn and is not restored.
 */
export function fromPlanSnapshot(snapshot: PlanSnapshot): Task[] {
  return snapshot.map(({ id, description, status, result }): Task => ({
    id,
    description,
    status,
    executionHistory: [],
    result,
  }));
}

/** True when there is a schedule and every task has finished. */
export function isScheduleComplete(state: AgentState): boolean {
  return (
    state.synthesizedSchedule.trim().length > 0 &&
    state.plan.length > 0 &&
    state.plan.every((task) => isTerminal(task.status))
  );
}
