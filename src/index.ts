/**
 * @fileoverview Server entry point for the conference concierge.
 *
 * Validates configuration, mounts the sessions API and closes the
 * SQLite stores on shutdown.
 */

import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();
import { createApp } from './app.js';
import { closeRetrievalEngine } from './retrieval/index.js';
import { closeSessionStore } from './services/session/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability();

const logger = createLogger({ domain: 'server' });
const app = createApp();

const server = app.listen(config.port, () => {
  logger.info('server_started', { port: config.port, env: config.nodeEnv });

  // Log presence of optional integrations (not values)
  logger.info('config_check', {
    hasSearchKey: !!config.search.apiKey,
    hasEmbeddingKey: !!config.embeddings.apiKey,
  });
});

let isShuttingDown = false;

// Graceful shutdown
function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });

  const forceExitTimer = setTimeout(() => {
    logger.warn('force_exit_after_timeout');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    closeSessionStore();
    closeRetrievalEngine();
    logger.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
