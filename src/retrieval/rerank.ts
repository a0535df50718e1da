/**
 * LLM re-ranking of nearest-neighbour candidates.
 */

import config from '../config.js';
import { getClient } from '../services/anthropic/client.js';
import { extractText, parseJsonObject } from '../services/anthropic/structured.js';
import { createLogger } from '../utils/observability/index.js';
import { isRecord } from '../utils/json.js';
import { RERANK_PROMPT } from './prompts.js';
import type { Candidate, Reranker, RerankResult } from './types.js';

const logger = createLogger({ domain: 'rerank' });

const EXCERPT_LIMIT = 600;

export function excerpt(document: string, limit: number): string {
  return document.length > limit ? `${document.slice(0, limit)}...` : document;
}

export function formatCandidates(query: string, candidates: Candidate[]): string {
  const blocks = candidates.map((candidate, i) => {
    const { title, room, track } = candidate.metadata;
    return [
      `[${i}] Title: ${title || '(no title)'}`,
      `Room: ${room} | Track: ${track}`,
      `Excerpt: ${excerpt(candidate.document, EXCERPT_LIMIT)}`,
    ].join('\n');
  });
  return `Query: ${query}\n\nRetrieved entries:\n${blocks.join('\n\n')}`;
}

/**
 * Read `{ results: [{ index, score, reason }] }`.
 * Entries without a numeric index and score are skipped.
 */
export function parseRerankResults(text: string): RerankResult[] | null {
  const parsed = parseJsonObject(text);
  // Boundary: validate shape before use
  if (!parsed || !Array.isArray(parsed.results)) {
    return null;
  }

  const results: RerankResult[] = [];
  for (const entry of parsed.results) {
    if (!isRecord(entry)) continue;
    const { index, score, reason } = entry;
    if (typeof index !== 'number' || !Number.isInteger(index) || typeof score !== 'number') {
      continue;
    }
    results.push({ index, score, reason: typeof reason === 'string' ? reason : '' });
  }
  return results;
}

export class ClaudeReranker implements Reranker {
  constructor(private readonly model: string = config.models.rerank) {}

  async rerank(query: string, candidates: Candidate[]): Promise<RerankResult[]> {
    if (candidates.length === 0) return [];

    const response = await getClient().messages.create({
      model: this.model,
      max_tokens: 1024,
      system: RERANK_PROMPT,
      messages: [{ role: 'user', content: formatCandidates(query, candidates) }],
    });

    const results = parseRerankResults(extractText(response));
    if (!results) {
      logger.warn('rerank_unparseable', { candidateCount: candidates.length });
      return [];
    }
    return results;
  }
}
