/**
 * Sessions API Route
 *
 * JSON API over the session store, the schedule index and the turn
 * handler. Work against one session (schedule upload, message turns) is
 * serialized with a per-session lock.
 *
 * Message turns answer with JSON, or with a stream of server-sent events
 * (`status`, `plan`, then `done` or `error`) when the client accepts
 * `text/event-stream`.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import config from '../config.js';
import {
  ProgressChannel,
  handleTurn,
  type HandleTurnOptions,
  type TurnResult,
} from '../orchestrator/index.js';
import { getRetrievalEngine, type RetrievalEngine } from '../retrieval/index.js';
import { getSessionStore, type SessionStore } from '../services/session/index.js';
import {
  AppError,
  SessionLockedError,
  SessionNotFoundError,
  errorMessage,
} from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'sessions-route' });

/**
 * Runs work for one key at a time, in arrival order.
 */
export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with queued or running work */
  get size(): number {
    return this.tails.size;
  }
}

export interface SessionsRouterOptions {
  store?: SessionStore;
  retrieval?: RetrievalEngine;
  lock?: SessionLock;
  /** Passed through to every turn */
  turn?: Omit<HandleTurnOptions, 'store' | 'progress'>;
}

type ErrorBody = { error: string; code: string };

function errorStatus(error: unknown): number {
  if (error instanceof SessionNotFoundError) return 404;
  if (error instanceof SessionLockedError) return 409;
  return 500;
}

function errorBody(error: unknown): ErrorBody {
  return {
    error: errorMessage(error),
    code: error instanceof AppError ? error.code : 'internal_error',
  };
}

function writeEvent(res: Response, type: string, data: unknown): void {
  res.write(`event: ${type}\ndata: ${JSON.stringify(data)}\n\n`);
}

/**
 * Forward rejections of an async handler to the router's error handler.
 */
function asyncRoute(handler: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function turnBody(result: TurnResult) {
  return {
    reply: result.reply,
    plan: result.plan,
    history: result.state.interactionHistory,
    scheduleComplete: result.scheduleComplete,
  };
}

export function createSessionsRouter(options: SessionsRouterOptions = {}): Router {
  const router = Router();
  const lock = options.lock ?? new SessionLock();
  const store = (): SessionStore => options.store ?? getSessionStore();
  const retrieval = (): RetrievalEngine => options.retrieval ?? getRetrievalEngine();

  router.get('/api/sessions', asyncRoute(async (_req: Request, res: Response) => {
    res.json({ sessions: await store().listSessions() });
  }));

  router.post('/api/sessions', asyncRoute(async (req: Request, res: Response) => {
    const title: unknown = req.body?.title;
    const session = await store().createSession(typeof title === 'string' ? title : undefined);
    logger.info('session_created', { sessionId: session.id });
    res.status(201).json(session);
  }));

  router.get('/api/sessions/:id', asyncRoute(async (req: Request, res: Response) => {
    const sessionId = req.params.id;
    const session = await store().getSession(sessionId);
    if (!session) {
      res.status(404).json(errorBody(new SessionNotFoundError(sessionId)));
      return;
    }

    const [history, plan] = await Promise.all([
      store().getHistory(sessionId),
      store().getPlan(sessionId),
    ]);
    res.json({ session, history, plan });
  }));

  router.delete('/api/sessions/:id', asyncRoute(async (req: Request, res: Response) => {
    const sessionId = req.params.id;
    const deleted = await lock.run(sessionId, async () => {
      const existed = await store().deleteSession(sessionId);
      if (existed) {
        retrieval().deleteSession(sessionId);
      }
      return existed;
    });

    if (!deleted) {
      res.status(404).json(errorBody(new SessionNotFoundError(sessionId)));
      return;
    }
    logger.info('session_deleted', { sessionId });
    res.status(204).end();
  }));

  router.post('/api/sessions/:id/schedule', asyncRoute(async (req: Request, res: Response) => {
    const sessionId = req.params.id;
    if (!(await store().getSession(sessionId))) {
      res.status(404).json(errorBody(new SessionNotFoundError(sessionId)));
      return;
    }

    const status = await lock.run(sessionId, async () => {
      const result = await retrieval().index(sessionId, req.body);
      await store().setUploadStatus(sessionId, result);
      return result;
    });
    logger.info('schedule_uploaded', { sessionId, status });
    res.json({ status });
  }));

  router.post('/api/sessions/:id/messages', asyncRoute(async (req: Request, res: Response) => {
    const sessionId = req.params.id;
    const message: unknown = req.body?.message;
    if (typeof message !== 'string' || !message.trim()) {
      res.status(400).json({ error: 'message is required', code: 'invalid_request' });
      return;
    }

    const session = await store().getSession(sessionId);
    if (!session) {
      res.status(404).json(errorBody(new SessionNotFoundError(sessionId)));
      return;
    }
    if (session.scheduleComplete) {
      res.status(409).json(errorBody(new SessionLockedError(sessionId)));
      return;
    }

    logger.info('message_received', { sessionId, messageLength: message.length });
    const turnOptions: HandleTurnOptions = { ...options.turn, store: store() };

    const wantsStream = req.get('accept')?.includes('text/event-stream') ?? false;
    if (!wantsStream) {
      try {
        const result = await lock.run(sessionId, () => handleTurn(sessionId, message, turnOptions));
        res.json(turnBody(result));
      } catch (error) {
        res.status(errorStatus(error)).json(errorBody(error));
      }
      return;
    }

    const progress = new ProgressChannel(config.progressBufferSize);
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    const outcome = lock
      .run(sessionId, () => handleTurn(sessionId, message, { ...turnOptions, progress }))
      .then(
        (result) => ({ ok: true as const, result }),
        (error: unknown) => ({ ok: false as const, error })
      )
      .finally(() => progress.close());

    for await (const event of progress) {
      writeEvent(res, event.type, event);
    }

    const settled = await outcome;
    if (settled.ok) {
      writeEvent(res, 'done', turnBody(settled.result));
    } else {
      writeEvent(res, 'error', errorBody(settled.error));
    }
    res.end();
  }));

  router.get('/api/sessions/:id/checkpoints', asyncRoute(async (req: Request, res: Response) => {
    const sessionId = req.params.id;
    if (!(await store().getSession(sessionId))) {
      res.status(404).json(errorBody(new SessionNotFoundError(sessionId)));
      return;
    }
    res.json({ checkpoints: await store().listCheckpoints(sessionId) });
  }));

  router.get('/api/sessions/:id/checkpoints/:step', asyncRoute(async (req: Request, res: Response) => {
    const sessionId = req.params.id;
    const stepIndex = Number(req.params.step);
    const checkpoint = Number.isInteger(stepIndex)
      ? await store().getCheckpoint(sessionId, stepIndex)
      : null;
    if (!checkpoint) {
      res.status(404).json({ error: 'Checkpoint not found', code: 'checkpoint_not_found' });
      return;
    }
    res.json(checkpoint);
  }));

  router.get('/api/sessions/:id/logs', asyncRoute(async (req: Request, res: Response) => {
    const sessionId = req.params.id;
    if (!(await store().getSession(sessionId))) {
      res.status(404).json(errorBody(new SessionNotFoundError(sessionId)));
      return;
    }
    res.json({ lines: await store().getRunLog(sessionId) });
  }));

  router.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('request_failed', { error: errorMessage(error) });
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(errorStatus(error)).json(errorBody(error));
  });

  return router;
}
