/**
 * Google Generative AI text embeddings.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import config from '../../config.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import type { Embedder } from '../../retrieval/types.js';

const logger = createLogger({ domain: 'embeddings' });

export class GeminiEmbedder implements Embedder {
  private client: GoogleGenerativeAI | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly model: string
  ) {}

  private getClient(): GoogleGenerativeAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new ConfigurationError('GEMINI_API_KEY not configured');
      }
      this.client = new GoogleGenerativeAI(this.apiKey);
    }
    return this.client;
  }

  /**
   * Embed one batch of texts, one vector per text, in order.
   */
  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const model = this.getClient().getGenerativeModel({ model: this.model });
    const startTime = Date.now();

    if (texts.length === 1) {
      const result = await model.embedContent(texts[0]);
      return [result.embedding.values];
    }

    const result = await model.batchEmbedContents({
      requests: texts.map((text) => ({
        content: { role: 'user', parts: [{ text }] },
      })),
    });

    logger.debug('batch_embedded', {
      count: texts.length,
      durationMs: Date.now() - startTime,
    });

    return result.embeddings.map((embedding) => embedding.values);
  }
}

let instance: GeminiEmbedder | null = null;

export function getEmbedder(): GeminiEmbedder {
  if (!instance) {
    instance = new GeminiEmbedder(config.embeddings.apiKey, config.embeddings.model);
  }
  return instance;
}
