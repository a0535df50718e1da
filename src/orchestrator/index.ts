/**
 * Orchestrator Module
 *
 * Sequences intake, planning and task execution for one conversation
 * turn, with checkpoints after every agent step.
 */

export * from './types.js';

export {
  createAgentState,
  cloneState,
  buildPlan,
  isTerminal,
  startTask,
  completeTask,
  failTask,
  toPlanSnapshot,
  fromPlanSnapshot,
  isScheduleComplete,
} from './state.js';

export { CheckpointLog } from './checkpoints.js';
export { ProgressChannel, DEFAULT_PROGRESS_CAPACITY } from './progress.js';

export {
  ConversationOrchestrator,
  STATUS_PLANNING,
  STATUS_UNDERSTANDING,
  executingStatus,
  type OrchestratorDeps,
} from './orchestrate.js';

export {
  handleTurn,
  rehydrateState,
  type HandleTurnOptions,
  type TurnAgents,
  type TurnResult,
} from './handler.js';
