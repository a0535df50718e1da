/**
 * Retrieval engine factory.
 *
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../config.js';
import { getEmbedder } from '../services/gemini/embeddings.js';
import { RetrievalEngine } from './engine.js';
import { ClaudeReranker } from './rerank.js';
import { SqliteVectorStore } from './store.js';

export { RetrievalEngine } from './engine.js';
export type { Embedder, Reranker, VectorStore, Candidate, RerankResult } from './types.js';

let store: SqliteVectorStore | null = null;
let engine: RetrievalEngine | null = null;

export function getRetrievalEngine(): RetrievalEngine {
  if (engine) {
    return engine;
  }

  store = new SqliteVectorStore(config.retrieval.sqlitePath);
  engine = new RetrievalEngine(store, getEmbedder(), new ClaudeReranker(), {
    retrieveK: config.retrieval.retrieveK,
    topK: config.retrieval.topK,
    batchSize: config.embeddings.batchSize,
  });
  return engine;
}

/**
 * Close the underlying store.
 * Call this during graceful shutdown.
 */
export function closeRetrievalEngine(): void {
  store?.close();
  store = null;
  engine = null;
}
