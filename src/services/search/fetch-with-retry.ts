/**
 * Retries for outbound search requests.
 *
 * A request is retried after a transient network error or a 408, 425, 429
 * or 5xx answer, waiting `delaysMs[n]` before retry n+1. Once the delays
 * run out the last answer is returned as is and the last error is thrown.
 */

import { errorMessage } from '../../utils/errors.js';
import { isRecord } from '../../utils/json.js';
import { createLogger } from '../../utils/observability/index.js';

const logger = createLogger({ domain: 'search-http' });

export interface RetryPolicy {
  /** Label for log records */
  operation: string;
  /** One entry per retry */
  delaysMs: number[];
}

export const DEFAULT_RETRY_DELAYS_MS = [250, 750];

// Codes undici puts on the cause of a failed fetch
const TRANSIENT_NETWORK_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 425, 429]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status) || status >= 500;
}

function causeCode(error: Error): string | undefined {
  const { cause } = error;
  return isRecord(cause) && typeof cause.code === 'string' ? cause.code : undefined;
}

export function isTransientNetworkError(error: unknown): boolean {
  if (!(error instanceof TypeError)) return false;
  const code = causeCode(error);
  if (code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) return true;
  return /fetch failed|network/i.test(error.message);
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function fetchWithRetry(url: string, init: RequestInit, policy: RetryPolicy): Promise<Response> {
  const { operation, delaysMs } = policy;

  for (let attempt = 0; ; attempt++) {
    const retryInMs = attempt < delaysMs.length ? delaysMs[attempt] : null;

    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      if (retryInMs === null || !isTransientNetworkError(error)) throw error;
      logger.warn('retry_after_network_error', {
        operation,
        attempt: attempt + 1,
        retryInMs,
        error: errorMessage(error),
      });
      await wait(retryInMs);
      continue;
    }

    if (response.ok || retryInMs === null || !isRetryableStatus(response.status)) {
      return response;
    }
    logger.warn('retry_after_status', { operation, attempt: attempt + 1, status: response.status, retryInMs });
    await wait(retryInMs);
  }
}
