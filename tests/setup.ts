/**
 * Global test setup for Vitest.
 *
 * This file runs before all tests. It configures the test environment
 * and sets up mock cleanup between tests.
 */

import { beforeEach, vi } from 'vitest';

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.ANTHROPIC_API_KEY = 'test-api-key';
process.env.GEMINI_API_KEY = 'test-gemini-key';
process.env.SERPER_API_KEY = 'test-serper-key';
process.env.SESSION_DB_PATH = './data/test-sessions.db';
process.env.RETRIEVAL_DB_PATH = './data/test-retrieval.db';

// Import mocks
import './mocks/anthropic.js';
import './mocks/gemini.js';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
});
