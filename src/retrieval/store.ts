/**
 * @fileoverview SQLite vector store for schedule documents.
 *
 * One collection per session. Embeddings are stored as float32 blobs and
 * ranked by cosine distance in process; a schedule holds a few hundred
 * talks at most.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { Candidate, TalkMetadata, VectorRecord, VectorStore } from './types.js';

type DocumentRow = {
  document: string;
  room: string;
  date: string;
  start: string;
  track: string;
  title: string;
  embedding: Buffer;
};

function toBlob(values: number[]): Buffer {
  return Buffer.from(new Float32Array(values).buffer);
}

function fromBlob(blob: Buffer): Float32Array {
  // Copy so the view starts on an aligned offset
  return new Float32Array(new Uint8Array(blob).buffer);
}

/**
 * Cosine distance (1 - similarity). Vectors of different length or with
 * zero magnitude are treated as unrelated (distance 1).
 */
export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length || a.length === 0) return 1;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  return magnitude === 0 ? 1 : 1 - dot / magnitude;
}

/**
 * SQLite implementation of the vector store.
 */
export class SqliteVectorStore implements VectorStore {
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
      CREATE TABLE IF NOT EXISTS schedule_collections (
        session_id TEXT PRIMARY KEY,
        indexed_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS schedule_documents (
        session_id TEXT NOT NULL,
        doc_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        document TEXT NOT NULL,
        room TEXT NOT NULL,
        date TEXT NOT NULL,
        start TEXT NOT NULL,
        track TEXT NOT NULL,
        title TEXT NOT NULL,
        embedding BLOB NOT NULL,
        PRIMARY KEY (session_id, doc_id)
      );

      CREATE TABLE IF NOT EXISTS schedule_overviews (
        session_id TEXT PRIMARY KEY,
        overview TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  }

  replace(sessionId: string, records: VectorRecord[]): void {
    const deleteDocs = this.db.prepare<[string]>('DELETE FROM schedule_documents WHERE session_id = ?');
    const upsertCollection = this.db.prepare<[string, number]>(
      `INSERT INTO schedule_collections (session_id, indexed_at) VALUES (?, ?)
       ON CONFLICT(session_id) DO UPDATE SET indexed_at = excluded.indexed_at`
    );
    const insertDoc = this.db.prepare<[string, string, number, string, string, string, string, string, string, Buffer]>(
      `INSERT INTO schedule_documents
       (session_id, doc_id, position, document, room, date, start, track, title, embedding)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const replaceAll = this.db.transaction((items: VectorRecord[]) => {
      deleteDocs.run(sessionId);
      upsertCollection.run(sessionId, Date.now());
      items.forEach((record, position) => {
        const { room, date, start, track, title } = record.metadata;
        insertDoc.run(
          sessionId,
          record.id,
          position,
          record.text,
          room,
          date,
          start,
          track,
          title,
          toBlob(record.embedding)
        );
      });
    });

    replaceAll(records);
  }

  hasCollection(sessionId: string): boolean {
    const row = this.db
      .prepare<[string], { session_id: string }>('SELECT session_id FROM schedule_collections WHERE session_id = ?')
      .get(sessionId);
    return row !== undefined;
  }

  count(sessionId: string): number {
    const row = this.db
      .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM schedule_documents WHERE session_id = ?')
      .get(sessionId);
    return row?.n ?? 0;
  }

  query(sessionId: string, embedding: number[], k: number): Candidate[] {
    const rows = this.db
      .prepare<[string], DocumentRow>(
        `SELECT document, room, date, start, track, title, embedding
         FROM schedule_documents
         WHERE session_id = ?
         ORDER BY position ASC`
      )
      .all(sessionId);

    return rows
      .map((row) => {
        const metadata: TalkMetadata = {
          room: row.room,
          date: row.date,
          start: row.start,
          track: row.track,
          title: row.title,
        };
        return {
          document: row.document,
          metadata,
          distance: cosineDistance(embedding, fromBlob(row.embedding)),
        };
      })
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  saveOverview(sessionId: string, overview: string): void {
    this.db
      .prepare<[string, string, number]>(
        `INSERT INTO schedule_overviews (session_id, overview, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(session_id) DO UPDATE SET overview = excluded.overview, updated_at = excluded.updated_at`
      )
      .run(sessionId, overview, Date.now());
  }

  getOverview(sessionId: string): string | null {
    const row = this.db
      .prepare<[string], { overview: string }>('SELECT overview FROM schedule_overviews WHERE session_id = ?')
      .get(sessionId);
    return row?.overview ?? null;
  }

  deleteSession(sessionId: string): void {
    this.db.transaction(() => {
      this.db.prepare<[string]>('DELETE FROM schedule_documents WHERE session_id = ?').run(sessionId);
      this.db.prepare<[string]>('DELETE FROM schedule_collections WHERE session_id = ?').run(sessionId);
      this.db.prepare<[string]>('DELETE FROM schedule_overviews WHERE session_id = ?').run(sessionId);
    })();
  }

  close(): void {
    this.db.close();
  }
}
