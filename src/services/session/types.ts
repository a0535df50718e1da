/**
 * Session Service Types
 *
 * Persistent storage for conference planning sessions: the visible
 * conversation, the latest plan, the fields of agent state that carry
 * over between turns, and the append-only checkpoint log.
 */

import type {
  AgentState,
  Interaction,
  PlanSnapshot,
  StateCheckpoint,
} from '../../orchestrator/types.js';

export interface SessionRecord {
  id: string;
  title: string;
  /** Unix timestamp (milliseconds) */
  createdAt: number;
  /** Result string of the last schedule upload, or null if none */
  uploadStatus: string | null;
  /** Set once a turn ends with a synthesized schedule and every task finished */
  scheduleComplete: boolean;
}

/** Checkpoint without its state snapshot, for listings. */
export interface CheckpointSummary {
  stepIndex: number;
  agentName: string | null;
  timestamp: string;
  metadata: Record<string, unknown>;
}

export interface StoredCheckpoint extends CheckpointSummary {
  state: AgentState;
}

export interface SessionStore {
  createSession(title?: string): Promise<SessionRecord>;

  getSession(sessionId: string): Promise<SessionRecord | null>;

  /** Newest first */
  listSessions(): Promise<SessionRecord[]>;

  /** Returns false when the session did not exist. */
  deleteSession(sessionId: string): Promise<boolean>;

  /** Conversation in order (oldest → newest) */
  getHistory(sessionId: string): Promise<Interaction[]>;

  addMessages(sessionId: string, messages: Interaction[]): Promise<void>;

  getPlan(sessionId: string): Promise<PlanSnapshot>;

  savePlan(sessionId: string, plan: PlanSnapshot): Promise<void>;

  /** Appends in stepIndex order; an existing stepIndex is rejected. */
  appendCheckpoints(sessionId: string, checkpoints: StateCheckpoint[]): Promise<void>;

  listCheckpoints(sessionId: string): Promise<CheckpointSummary[]>;

  getCheckpoint(sessionId: string, stepIndex: number): Promise<StoredCheckpoint | null>;

  /** stepIndex the next checkpoint for this session should take */
  nextStepIndex(sessionId: string): Promise<number>;

  setUploadStatus(sessionId: string, status: string): Promise<void>;

  /** Replaces the run log of the previous turn. */
  saveRunLog(sessionId: string, lines: string[]): Promise<void>;

  getRunLog(sessionId: string): Promise<string[]>;

  setScheduleComplete(sessionId: string, complete: boolean): Promise<void>;
}
