/**
 * Test app factory.
 *
 * Creates an Express app instance for integration testing without starting
 * the server or listening on a port. Stores live on temp SQLite files.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type express from 'express';
import { createApp } from '../../src/app.js';
import type { TurnAgents } from '../../src/orchestrator/handler.js';
import { RetrievalEngine } from '../../src/retrieval/engine.js';
import { SqliteVectorStore } from '../../src/retrieval/store.js';
import type { Embedder, Reranker } from '../../src/retrieval/types.js';
import type { Guardrail } from '../../src/services/guardrails/index.js';
import { SqliteSessionStore } from '../../src/services/session/sqlite.js';

export interface TestAppContext {
  app: express.Application;
  store: SqliteSessionStore;
  vectorStore: SqliteVectorStore;
  retrieval: RetrievalEngine;
  cleanup: () => void;
}

export const allowAll: Guardrail = {
  checkInput: async () => ({ allowed: true, message: '' }),
  checkOutput: async () => ({ allowed: true, message: '' }),
};

const constantEmbedder: Embedder = {
  embed: async (texts) => texts.map(() => [1, 0]),
};

const emptyReranker: Reranker = {
  rerank: async () => [],
};

/**
 * Create a test Express app with the sessions API configured.
 */
export function createTestApp(agents: TurnAgents, guardrail: Guardrail = allowAll): TestAppContext {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'concierge-app-'));
  const store = new SqliteSessionStore(path.join(tempDir, 'sessions.db'));
  const vectorStore = new SqliteVectorStore(path.join(tempDir, 'retrieval.db'));
  const retrieval = new RetrievalEngine(vectorStore, constantEmbedder, emptyReranker);

  const app = createApp({
    store,
    retrieval,
    turn: { guardrail, agentFactory: () => agents },
  });

  return {
    app,
    store,
    vectorStore,
    retrieval,
    cleanup: () => {
      store.close();
      vectorStore.close();
      fs.rmSync(tempDir, { recursive: true, force: true });
    },
  };
}
