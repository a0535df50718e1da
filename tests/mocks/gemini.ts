/**
 * Mock for @google/generative-ai module.
 *
 * Embeddings are deterministic functions of the text so tests can
 * compute expected vectors.
 */

import { vi } from 'vitest';

/**
 * Fake embedding: [length, vowel count, 1].
 */
export function fakeEmbedding(text: string): number[] {
  const vowels = (text.match(/[aeiou]/gi) ?? []).length;
  return [text.length, vowels, 1];
}

type EmbedRequest = { content: { role: string; parts: Array<{ text: string }> } };

export const mockEmbedContent = vi.fn(async (text: string) => ({
  embedding: { values: fakeEmbedding(text) },
}));

export const mockBatchEmbedContents = vi.fn(async (params: { requests: EmbedRequest[] }) => ({
  embeddings: params.requests.map((request) => ({
    values: fakeEmbedding(request.content.parts.map((part) => part.text).join('')),
  })),
}));

export const mockGetGenerativeModel = vi.fn((_params: { model: string }) => ({
  embedContent: mockEmbedContent,
  batchEmbedContents: mockBatchEmbedContents,
}));

export class GoogleGenerativeAI {
  constructor(public readonly apiKey: string) {}

  getGenerativeModel(params: { model: string }) {
    return mockGetGenerativeModel(params);
  }
}

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI,
}));
