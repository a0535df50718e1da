/**
 * Append-only checkpoint log.
 *
 * Each checkpoint owns a frozen deep snapshot of the state it was given,
 * so later mutation of the live state never shows through.
 */

import { cloneState, freezeState } from './state.js';
import type { AgentState, StateCheckpoint } from './types.js';

export class CheckpointLog {
  private readonly entries: StateCheckpoint[] = [];

  /**
   * @param startIndex stepIndex of the first checkpoint, for logs that
   *   continue a session's earlier turns
   */
  constructor(private readonly startIndex: number = 0) {}

  append(
    state: AgentState,
    agentName: string | null,
    metadata: Record<string, unknown> = {}
  ): StateCheckpoint {
    const checkpoint: StateCheckpoint = Object.freeze({
      stepIndex: this.startIndex + this.entries.length,
      state: freezeState(state),
      agentName,
      timestamp: new Date().toISOString(),
      metadata: Object.freeze({ ...metadata }),
    });
    this.entries.push(checkpoint);
    return checkpoint;
  }

  /** Checkpoints in stepIndex order. */
  list(): StateCheckpoint[] {
    return [...this.entries];
  }

  /** Independent, mutable copy of the state at a step, or null. */
  stateAt(stepIndex: number): AgentState | null {
    const checkpoint = this.entries[stepIndex - this.startIndex];
    return checkpoint ? cloneState(checkpoint.state) : null;
  }

  get size(): number {
    return this.entries.length;
  }
}
