/**
 * Orchestrator Type Definitions
 *
 * Core types for the conversation state machine: the per-conversation
 * agent state, the tasks a plan is made of, the private execution history
 * of each task, and the checkpoints written after every agent invocation.
 */

// ============================================================================
// Conversation Types
// ============================================================================

export type InteractionRole = 'user' | 'assistant';

export interface Interaction {
  role: InteractionRole;
  content: string;
}

// ============================================================================
// Task Types
// ============================================================================

/**
 * Status of a task.
 * State machine: pending → in_progress → completed | failed
 */
export type TaskStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

/** A tool call exactly as the model requested it. */
export interface ToolCallRequest {
  id: string;
  name: string;
  /** JSON-encoded arguments */
  arguments: string;
}

/** Raw assistant turn, with any tool calls it requested. */
export interface AssistantEntry {
  kind: 'assistant';
  content: string;
  toolCalls: ToolCallRequest[];
}

export interface ToolResultEntry {
  kind: 'tool_result';
  toolCallId: string;
  toolName: string;
  content: string;
  isError: boolean;
}

/** Free assistant text that requested no tool. */
export interface NoteEntry {
  kind: 'note';
  content: string;
}

export type ExecutionEntry = AssistantEntry | ToolResultEntry | NoteEntry;

/**
 * A single task in the plan.
 */
export interface Task {
  /** Position in the plan, 0..N-1 */
  readonly id: number;

  /** Single-purpose natural language description */
  description: string;

  status: TaskStatus;

  /** Model/tool exchange for this task only */
  executionHistory: ExecutionEntry[];

  /** Set once, by the transition to completed */
  result: string;
}

// ============================================================================
// Agent State
// ============================================================================

export interface AgentState {
  conversationId: string;

  /** Details intake still needs before planning */
  necessaryDetailsRequired: string[];

  /** Details that would improve the plan but are not blocking */
  optionalDetails: string[];

  /** Intake summary; empty until intake decides to plan */
  queryToPlan: string;

  planDescription: string[];
  plan: Task[];

  /** Latest itinerary produced by generate_schedule */
  synthesizedSchedule: string;

  interactionHistory: Interaction[];
}

// ============================================================================
// Checkpoints
// ============================================================================

export interface StateCheckpoint {
  /** Monotonic, starting at 0 */
  stepIndex: number;

  /** Frozen deep snapshot */
  state: Readonly<AgentState>;

  /** Agent that produced this state, or null for orchestrator events */
  agentName: string | null;

  /** ISO-8601 */
  timestamp: string;

  metadata: Record<string, unknown>;
}

/** Persisted view of a plan. */
export interface PlanSnapshotEntry {
  id: number;
  description: string;
  status: TaskStatus;
  result: string;
}

export type PlanSnapshot = PlanSnapshotEntry[];

// ============================================================================
// Progress
// ============================================================================

export type ProgressEvent =
  | { type: 'status'; message: string }
  | { type: 'plan'; plan: PlanSnapshot };
