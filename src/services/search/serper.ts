/**
 * Serper web and places search.
 *
 * Every failure is returned as a string so the model can read it and
 * decide what to do next.
 */

import config from '../../config.js';
import { errorMessage } from '../../utils/errors.js';
import { isRecord } from '../../utils/json.js';
import { createLogger } from '../../utils/observability/index.js';
import { DEFAULT_RETRY_DELAYS_MS, fetchWithRetry } from './fetch-with-retry.js';

const logger = createLogger({ domain: 'search' });

export interface SerperOptions {
  apiKey?: string;
  baseUrl: string;
  /** Two-letter country code passed as `gl` */
  country: string;
  timeoutMs: number;
  retryDelaysMs?: number[];
}

type SearchKind = {
  path: '/search' | '/places';
  label: 'search' | 'places';
  resultKey: 'organic' | 'places';
  emptyMessage: string;
};

const WEB: SearchKind = {
  path: '/search',
  label: 'search',
  resultKey: 'organic',
  emptyMessage: 'No organic results returned.',
};

const PLACES: SearchKind = {
  path: '/places',
  label: 'places',
  resultKey: 'places',
  emptyMessage: 'No places returned.',
};

export class SerperClient {
  constructor(private readonly options: SerperOptions) {}

  webSearch(query: string): Promise<string> {
    return this.search(WEB, query);
  }

  placesSearch(query: string): Promise<string> {
    return this.search(PLACES, query);
  }

  private async search(kind: SearchKind, query: string): Promise<string> {
    const { apiKey, baseUrl, country, timeoutMs, retryDelaysMs } = this.options;
    if (!apiKey) {
      return `Error calling ${kind.label} API: SERPER_API_KEY not configured`;
    }

    const startTime = Date.now();
    let response: Response;
    try {
      response = await fetchWithRetry(
        `${baseUrl}${kind.path}`,
        {
          method: 'POST',
          headers: {
            'X-API-KEY': apiKey,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({ q: query, gl: country }),
          signal: AbortSignal.timeout(timeoutMs),
        },
        { operation: `Serper ${kind.label}`, delaysMs: retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS }
      );
    } catch (error) {
      logger.warn('search_request_failed', { kind: kind.label, error: errorMessage(error) });
      return `Error calling ${kind.label} API: ${errorMessage(error)}`;
    }

    if (!response.ok) {
      logger.warn('search_http_error', { kind: kind.label, status: response.status });
      return `Error calling ${kind.label} API: ${response.status} ${response.statusText}`;
    }

    const text = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return `Error: invalid JSON from ${kind.label} API: ${text.slice(0, 500)}`;
    }

    const results = isRecord(body) ? body[kind.resultKey] : undefined;

    logger.info('search_complete', {
      kind: kind.label,
      count: Array.isArray(results) ? results.length : 0,
      durationMs: Date.now() - startTime,
    });

    if (!Array.isArray(results) || results.length === 0) {
      return JSON.stringify({ [kind.resultKey]: [], message: kind.emptyMessage });
    }
    return JSON.stringify(results);
  }
}

let client: SerperClient | null = null;

export function getSearchClient(): SerperClient {
  if (!client) {
    client = new SerperClient(config.search);
  }
  return client;
}
