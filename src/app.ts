/**
 * @fileoverview Express application factory.
 *
 * Builds the app without listening, so tests can drive it with supertest.
 */

import express from 'express';
import { createSessionsRouter, type SessionsRouterOptions } from './routes/sessions.js';

/** Schedule documents can be large. */
const JSON_BODY_LIMIT = '10mb';

export function createApp(options: SessionsRouterOptions = {}): express.Application {
  const app = express();

  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.use(createSessionsRouter(options));

  return app;
}
