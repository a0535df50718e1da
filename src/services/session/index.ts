/**
 * @fileoverview Session store factory.
 *
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { SessionStore } from './types.js';
import { SqliteSessionStore } from './sqlite.js';

export type {
  CheckpointSummary,
  SessionRecord,
  SessionStore,
  StoredCheckpoint,
} from './types.js';
export { SqliteSessionStore } from './sqlite.js';

let instance: SqliteSessionStore | null = null;

export function getSessionStore(): SessionStore {
  if (instance) {
    return instance;
  }

  instance = new SqliteSessionStore(config.sessions.sqlitePath);
  return instance;
}

/**
 * Close the session store.
 * Call this during graceful shutdown.
 */
export function closeSessionStore(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}

/**
 * Reset the session store instance.
 * Useful for tests.
 */
export function resetSessionStore(): void {
  instance = null;
}
