/**
 * Agent Type Definitions
 *
 * Core types for the agent system. Each agent is one reasoning step that
 * receives the conversation state, mutates it and hands it back.
 */

import type { AgentState } from '../orchestrator/types.js';
import type { TraceLogger } from '../utils/trace-logger.js';

// ============================================================================
// Limits
// ============================================================================

/** Model requests allowed per task before it is marked failed */
export const MAX_TASK_TURNS = 20;

/** Recoverable tool errors allowed per task; one more is fatal */
export const MAX_TOOL_ERRORS = 5;

// ============================================================================
// Agent Contract
// ============================================================================

/**
 * Capability shared by every agent.
 * Agents never keep a reference to the state after advance() resolves.
 */
export interface Agent<Args extends unknown[] = []> {
  /** Recorded on checkpoints */
  readonly name: string;

  advance(state: AgentState, ...args: Args): Promise<AgentState>;
}

/**
 * Per-turn collaborators handed to agents.
 */
export interface AgentRunContext {
  /** Trace logger for debugging (writes only in development) */
  trace?: TraceLogger;
}
