/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the application requires.
 *
 * @see .env.example for required environment variables
 */

import 'dotenv/config';
import { ConfigurationError } from './utils/errors.js';

// ---------------------------------------------------------------------------
// Config helpers
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  anthropicApiKey: required('ANTHROPIC_API_KEY'),

  /** Claude model IDs, one per reasoning role */
  models: {
    intake: optional('INTAKE_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    planner: optional('PLANNER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    executor: optional('EXECUTOR_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    synthesizer: optional('SYNTHESIZER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    rerank: optional('RERANK_MODEL_ID', 'claude-haiku-4-5-20251001'),
    guardrail: optional('GUARDRAIL_MODEL_ID', 'claude-haiku-4-5-20251001'),
  },

  /** Google Generative AI embeddings for the schedule index */
  embeddings: {
    apiKey: process.env.GEMINI_API_KEY,
    model: optional('EMBEDDING_MODEL', 'text-embedding-004'),
    batchSize: optionalInt('EMBEDDING_BATCH_SIZE', 100),
  },

  /** Serper web and places search */
  search: {
    apiKey: process.env.SERPER_API_KEY,
    baseUrl: optional('SERPER_BASE_URL', 'https://google.serper.dev'),
    country: optional('SEARCH_COUNTRY', 'de'),
    timeoutMs: optionalInt('SEARCH_TIMEOUT_MS', 15000),
  },

  /** Session storage (history, plans, checkpoints) */
  sessions: {
    sqlitePath: dbPath('SESSION_DB_PATH', '/app/data/sessions.db', './data/sessions.db'),
  },

  /** Per-session schedule index */
  retrieval: {
    sqlitePath: dbPath('RETRIEVAL_DB_PATH', '/app/data/retrieval.db', './data/retrieval.db'),
    retrieveK: optionalInt('RAG_RETRIEVE_K', 20),
    topK: optionalInt('RAG_TOP_K', 5),
  },

  /** Progress side channel buffer size */
  progressBufferSize: optionalInt('PROGRESS_BUFFER_SIZE', 256),
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // Required API keys
  if (!config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }
  if (!config.embeddings.apiKey) {
    errors.push('GEMINI_API_KEY is required');
  }

  // Numeric bounds
  if (config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (config.embeddings.batchSize < 1 || config.embeddings.batchSize > 100) {
    errors.push(`EMBEDDING_BATCH_SIZE must be 1-100, got ${config.embeddings.batchSize}`);
  }
  if (config.retrieval.retrieveK < 1) {
    errors.push(`RAG_RETRIEVE_K must be >= 1, got ${config.retrieval.retrieveK}`);
  }
  if (config.retrieval.topK < 1 || config.retrieval.topK > config.retrieval.retrieveK) {
    errors.push(`RAG_TOP_K must be 1-${config.retrieval.retrieveK}, got ${config.retrieval.topK}`);
  }
  if (config.search.timeoutMs < 1000) {
    errors.push(`SEARCH_TIMEOUT_MS must be >= 1000, got ${config.search.timeoutMs}`);
  }
  if (config.progressBufferSize < 1) {
    errors.push(`PROGRESS_BUFFER_SIZE must be >= 1, got ${config.progressBufferSize}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new ConfigurationError(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
