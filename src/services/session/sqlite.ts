/**
 * @fileoverview SQLite session store.
 *
 * One row per session plus ordered message and checkpoint tables.
 * Plan and the run log are JSON columns on the
 * session row.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';
import type { Interaction, PlanSnapshot, StateCheckpoint, AgentState } from '../../orchestrator/types.js';
import type {
  CheckpointSummary,
  SessionRecord,
  SessionStore,
  StoredCheckpoint,
} from './types.js';

type SessionRow = {
  id: string;
  title: string;
  created_at: number;
  upload_status: string | null;
  schedule_complete: number;
};

type CheckpointRow = {
  step_index: number;
  agent_name: string | null;
  timestamp: string;
  metadata_json: string;
};

function toSessionRecord(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    title: row.title,
    createdAt: row.created_at,
    uploadStatus: row.upload_status,
    scheduleComplete: row.schedule_complete === 1,
  };
}

function toCheckpointSummary(row: CheckpointRow): CheckpointSummary {
  return {
    stepIndex: row.step_index,
    agentName: row.agent_name,
    timestamp: row.timestamp,
    metadata: JSON.parse(row.metadata_json) as Record<string, unknown>,
  };
}

/**
 * SQLite implementation of session store.
 */
export class SqliteSessionStore implements SessionStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    // Ensure directory exists
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(dbPath);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        upload_status TEXT,
        schedule_complete INTEGER NOT NULL DEFAULT 0,
        plan_json TEXT NOT NULL DEFAULT '[]',
        run_log_json TEXT NOT NULL DEFAULT '[]'
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_created
        ON sessions(created_at DESC);

      CREATE TABLE IF NOT EXISTS session_messages (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_session_messages_position
        ON session_messages(session_id, position);

      CREATE TABLE IF NOT EXISTS session_checkpoints (
        session_id TEXT NOT NULL,
        step_index INTEGER NOT NULL,
        agent_name TEXT,
        timestamp TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        state_json TEXT NOT NULL,
        PRIMARY KEY (session_id, step_index)
      );
    `);
  }

  async createSession(title?: string): Promise<SessionRecord> {
    const id = randomUUID();
    const createdAt = Date.now();
    const resolvedTitle = title?.trim() || `Session ${id.slice(0, 8)}`;

    this.db
      .prepare(`INSERT INTO sessions (id, title, created_at) VALUES (?, ?, ?)`)
      .run(id, resolvedTitle, createdAt);

    return {
      id,
      title: resolvedTitle,
      createdAt,
      uploadStatus: null,
      scheduleComplete: false,
    };
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    const row = this.db
      .prepare<[string], SessionRow>(
        `SELECT id, title, created_at, upload_status, schedule_complete
         FROM sessions WHERE id = ?`
      )
      .get(sessionId);
    return row ? toSessionRecord(row) : null;
  }

  async listSessions(): Promise<SessionRecord[]> {
    const rows = this.db
      .prepare<[], SessionRow>(
        `SELECT id, title, created_at, upload_status, schedule_complete
         FROM sessions ORDER BY created_at DESC, rowid DESC`
      )
      .all();
    return rows.map(toSessionRecord);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const remove = this.db.transaction((id: string) => {
      this.db.prepare(`DELETE FROM session_messages WHERE session_id = ?`).run(id);
      this.db.prepare(`DELETE FROM session_checkpoints WHERE session_id = ?`).run(id);
      return this.db.prepare(`DELETE FROM sessions WHERE id = ?`).run(id).changes > 0;
    });
    return remove(sessionId);
  }

  async getHistory(sessionId: string): Promise<Interaction[]> {
    const rows = this.db
      .prepare<[string], { role: string; content: string }>(
        `SELECT role, content FROM session_messages
         WHERE session_id = ? ORDER BY position ASC`
      )
      .all(sessionId);

    return rows.map((row) => ({
      role: row.role === 'assistant' ? 'assistant' : 'user',
      content: row.content,
    }));
  }

  async addMessages(sessionId: string, messages: Interaction[]): Promise<void> {
    if (messages.length === 0) return;

    const insert = this.db.transaction((items: Interaction[]) => {
      const last = this.db
        .prepare<[string], { maxPosition: number | null }>(
          `SELECT MAX(position) AS maxPosition FROM session_messages WHERE session_id = ?`
        )
        .get(sessionId);
      let position = (last?.maxPosition ?? -1) + 1;
      const statement = this.db.prepare(
        `INSERT INTO session_messages (id, session_id, position, role, content, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      );
      const now = Date.now();
      for (const message of items) {
        statement.run(randomUUID(), sessionId, position++, message.role, message.content, now);
      }
    });
    insert(messages);
  }

  async getPlan(sessionId: string): Promise<PlanSnapshot> {
    const row = this.db
      .prepare<[string], { plan_json: string }>(`SELECT plan_json FROM sessions WHERE id = ?`)
      .get(sessionId);
    return row ? (JSON.parse(row.plan_json) as PlanSnapshot) : [];
  }

  async savePlan(sessionId: string, plan: PlanSnapshot): Promise<void> {
    this.db
      .prepare(`UPDATE sessions SET plan_json = ? WHERE id = ?`)
      .run(JSON.stringify(plan), sessionId);
  }

  async appendCheckpoints(sessionId: string, checkpoints: StateCheckpoint[]): Promise<void> {
    if (checkpoints.length === 0) return;

    const insert = this.db.transaction((items: StateCheckpoint[]) => {
      const statement = this.db.prepare(
        `INSERT INTO session_checkpoints
         (session_id, step_index, agent_name, timestamp, metadata_json, state_json)
         VALUES (?, ?, ?, ?, ?, ?)`
      );
      for (const checkpoint of items) {
        statement.run(
          sessionId,
          checkpoint.stepIndex,
          checkpoint.agentName,
          checkpoint.timestamp,
          JSON.stringify(checkpoint.metadata),
          JSON.stringify(checkpoint.state)
        );
      }
    });
    insert(checkpoints);
  }

  async listCheckpoints(sessionId: string): Promise<CheckpointSummary[]> {
    const rows = this.db
      .prepare<[string], CheckpointRow>(
        `SELECT step_index, agent_name, timestamp, metadata_json
         FROM session_checkpoints WHERE session_id = ? ORDER BY step_index ASC`
      )
      .all(sessionId);
    return rows.map(toCheckpointSummary);
  }

  async getCheckpoint(sessionId: string, stepIndex: number): Promise<StoredCheckpoint | null> {
    const row = this.db
      .prepare<[string, number], CheckpointRow & { state_json: string }>(
        `SELECT step_index, agent_name, timestamp, metadata_json, state_json
         FROM session_checkpoints WHERE session_id = ? AND step_index = ?`
      )
      .get(sessionId, stepIndex);
    if (!row) return null;

    return {
      ...toCheckpointSummary(row),
      state: JSON.parse(row.state_json) as AgentState,
    };
  }

  async nextStepIndex(sessionId: string): Promise<number> {
    const row = this.db
      .prepare<[string], { maxStep: number | null }>(
        `SELECT MAX(step_index) AS maxStep FROM session_checkpoints WHERE session_id = ?`
      )
      .get(sessionId);
    return (row?.maxStep ?? -1) + 1;
  }

  async setUploadStatus(sessionId: string, status: string): Promise<void> {
    this.db
      .prepare(`UPDATE sessions SET upload_status = ? WHERE id = ?`)
      .run(status, sessionId);
  }

  async saveRunLog(sessionId: string, lines: string[]): Promise<void> {
    this.db
      .prepare(`UPDATE sessions SET run_log_json = ? WHERE id = ?`)
      .run(JSON.stringify(lines), sessionId);
  }

  async getRunLog(sessionId: string): Promise<string[]> {
    const row = this.db
      .prepare<[string], { run_log_json: string }>(`SELECT run_log_json FROM sessions WHERE id = ?`)
      .get(sessionId);
    return row ? (JSON.parse(row.run_log_json) as string[]) : [];
  }

  async setScheduleComplete(sessionId: string, complete: boolean): Promise<void> {
    this.db
      .prepare(`UPDATE sessions SET schedule_complete = ? WHERE id = ?`)
      .run(complete ? 1 : 0, sessionId);
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}
