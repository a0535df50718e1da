/**
 * RetrievalEngine
 *
 * Indexes an uploaded schedule into a per-session vector collection and
 * answers semantic queries: embed → nearest neighbours → LLM re-rank.
 * Every outcome is a string the executor can hand straight to the model.
 */

import { errorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/json.js';
import { createLogger } from '../utils/observability/index.js';
import { scheduleDays, scheduleDocuments, scheduleOverview } from './documents.js';
import { excerpt } from './rerank.js';
import type { Candidate, Embedder, Reranker, RerankResult, VectorStore } from './types.js';

const logger = createLogger({ domain: 'retrieval' });

export const NOT_A_SCHEDULE = 'Not a recognized schedule format (missing days).';
export const NO_TALKS = 'No talks found in schedule.';
export const NO_OVERVIEW = 'No schedule overview for this session. Upload a schedule file first.';
export const NOT_INDEXED = 'No schedule has been indexed for this session. Upload a schedule file first.';
export const NO_MATCHES = 'No matching sessions found.';
export const NO_RELEVANT = 'No relevant sessions found after re-ranking.';

/** Scores at or below this are dropped after re-ranking. */
const MIN_RELEVANT_SCORE = 3;
const RESULT_EXCERPT_LIMIT = 800;

export interface RetrievalOptions {
  /** Nearest neighbours fetched before re-ranking */
  retrieveK: number;
  /** Results returned after re-ranking */
  topK: number;
  /** Texts per embedding request */
  batchSize: number;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  retrieveK: 20,
  topK: 5,
  batchSize: 100,
};

/**
 * Filter and order re-rank output against the candidate list.
 *
 * Drops low scores and out-of-range or repeated indexes (first wins),
 * then sorts by descending score. The sort is stable, so ties keep the
 * model's order.
 */
export function selectReranked(
  results: RerankResult[],
  candidateCount: number,
  topK: number
): RerankResult[] {
  const seen = new Set<number>();
  const kept = results.filter((result) => {
    if (result.score <= MIN_RELEVANT_SCORE) return false;
    if (result.index < 0 || result.index >= candidateCount) return false;
    if (seen.has(result.index)) return false;
    seen.add(result.index);
    return true;
  });
  return kept.sort((a, b) => b.score - a.score).slice(0, topK);
}

export function formatResults(candidates: Candidate[], selected: RerankResult[]): string {
  const lines: string[] = [];
  selected.forEach((result, rank) => {
    const { document, metadata } = candidates[result.index];
    lines.push(
      `--- Result ${rank + 1} ---`,
      `Title: ${metadata.title || '(no title)'}`,
      `Room: ${metadata.room}`,
      `Date: ${metadata.date}`,
      `Start: ${metadata.start}`,
      `Track: ${metadata.track}`,
      `Excerpt: ${excerpt(document, RESULT_EXCERPT_LIMIT)}\n`
    );
  });
  return lines.join('\n').trim();
}

export class RetrievalEngine {
  private readonly options: RetrievalOptions;

  constructor(
    private readonly store: VectorStore,
    private readonly embedder: Embedder,
    private readonly reranker: Reranker,
    options: Partial<RetrievalOptions> = {}
  ) {
    this.options = { ...DEFAULT_RETRIEVAL_OPTIONS, ...options };
  }

  /**
   * Index a schedule for a session, replacing any previous index.
   * Accepts a parsed JSON value or raw JSON text. Returns a status line.
   */
  async index(sessionId: string, scheduleDocument: unknown): Promise<string> {
    let data: unknown = scheduleDocument;
    if (typeof scheduleDocument === 'string') {
      try {
        data = JSON.parse(scheduleDocument);
      } catch (error) {
        return `Invalid or unreadable JSON: ${errorMessage(error)}`;
      }
    }

    if (!isRecord(data) || scheduleDays(data).length === 0) {
      return NOT_A_SCHEDULE;
    }

    const documents = scheduleDocuments(data);
    if (documents.length === 0) {
      return NO_TALKS;
    }

    const embeddings = await this.embedAll(documents.map((doc) => doc.text));
    this.store.replace(
      sessionId,
      documents.map((doc, i) => ({ ...doc, embedding: embeddings[i] }))
    );
    this.store.saveOverview(sessionId, scheduleOverview(data));

    logger.info('schedule_indexed', { sessionId, count: documents.length });
    return `Indexed ${documents.length} sessions for RAG and saved schedule overview.`;
  }

  overview(sessionId: string): string {
    return this.store.getOverview(sessionId) ?? NO_OVERVIEW;
  }

  /**
   * Semantic search over the session's schedule, re-ranked by the model.
   */
  async query(sessionId: string, text: string, topK: number = this.options.topK): Promise<string> {
    if (!this.store.hasCollection(sessionId)) {
      return NOT_INDEXED;
    }

    const [embedding] = await this.embedder.embed([text.trim() || ' ']);
    const candidates = this.store.query(sessionId, embedding, this.options.retrieveK);
    if (candidates.length === 0) {
      return NO_MATCHES;
    }

    const reranked = await this.reranker.rerank(text, candidates);
    const selected = selectReranked(reranked, candidates.length, topK);

    logger.info('query_complete', {
      sessionId,
      candidateCount: candidates.length,
      rerankedCount: reranked.length,
      count: selected.length,
    });

    if (selected.length === 0) {
      return NO_RELEVANT;
    }
    return formatResults(candidates, selected);
  }

  documentCount(sessionId: string): number {
    return this.store.count(sessionId);
  }

  deleteSession(sessionId: string): void {
    this.store.deleteSession(sessionId);
  }

  private async embedAll(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      const batch = texts
        .slice(i, i + this.options.batchSize)
        .map((text) => text.trim() || ' ');
      vectors.push(...(await this.embedder.embed(batch)));
    }
    return vectors;
  }
}
