import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext, RunLogCollector } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();
const runLogStorage = new AsyncLocalStorage<RunLogCollector>();

export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  const merged = { ...parent, ...context };
  return logContextStorage.run(merged, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

/**
 * Run fn with a collector that receives one line per log record
 * emitted inside it, formatted as `[HH:MM:SS] domain | event`.
 */
export function withRunLog<T>(collector: RunLogCollector, fn: () => T): T {
  return runLogStorage.run(collector, fn);
}

export function getRunLog(): RunLogCollector | undefined {
  return runLogStorage.getStore();
}

export function createRunId(prefix = 'run'): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
