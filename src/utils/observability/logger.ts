/**
 * Structured JSON logging.
 *
 * Every record is one JSON line on stdout (stderr for warn and error). In
 * development records are also appended to an NDJSON file, and inside
 * withRunLog each non-debug record adds a summary line to the run log.
 */

import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { dirname, join } from 'path';
import { getLogContext, getRunLog } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

// Domains that see raw user text keep only these fields
const RESTRICTED_DOMAINS: ReadonlySet<string> = new Set(['sessions-route', 'turn-handler', 'guardrails']);
const RESTRICTED_FIELDS: ReadonlySet<string> = new Set([
  'durationMs',
  'totalDurationMs',
  'messageLength',
  'replyLength',
  'allowed',
  'direction',
  'status',
  'count',
  'taskCount',
  'scheduleComplete',
  'error',
  'code',
]);
const RESTRICTED_FIELD_PATTERNS = [/^has[A-Z]/, /^[a-zA-Z]+Id$/];

/** Development NDJSON file, reopened when the target path changes. */
class NdjsonFile {
  private path: string | null = null;
  private stream: WriteStream | null = null;

  write(line: string): void {
    const target = logFilePath();
    if (!target) return;
    if (target !== this.path) this.open(target);
    this.stream?.write(`${line}\n`);
  }

  close(): void {
    this.stream?.end();
    this.stream = null;
    this.path = null;
  }

  private open(target: string): void {
    this.close();
    this.path = target;
    try {
      mkdirSync(dirname(target), { recursive: true });
      const stream = createWriteStream(target, { flags: 'a', encoding: 'utf-8' });
      // A broken sink stops file logging; stdout keeps working
      stream.on('error', () => {
        this.stream = null;
      });
      this.stream = stream;
    } catch {
      this.stream = null;
    }
  }
}

const ndjsonFile = new NdjsonFile();
let exitHooksInstalled = false;

function logFilePath(): string | null {
  if (process.env.NODE_ENV !== 'development') return null;
  const configured = process.env.APP_LOG_FILE;
  if (configured === 'off') return null;
  if (configured) return configured;

  const baseDir = process.env.APP_LOG_DIR || process.env.TRACE_LOG_DIR || './logs';
  return join(baseDir, new Date().toISOString().slice(0, 10), 'app.ndjson');
}

function keepRestrictedFields(data: LogData): LogData {
  const kept: LogData = {};
  for (const [key, value] of Object.entries(data)) {
    if (RESTRICTED_FIELDS.has(key) || RESTRICTED_FIELD_PATTERNS.some((pattern) => pattern.test(key))) {
      kept[key] = value;
    }
  }
  return kept;
}

function buildRecord(level: LogLevel, event: string, bound: LogContext, data: LogData = {}): AppLogRecord {
  const context: LogContext = { ...getLogContext(), ...bound };
  const redacted = redactSecrets(data);
  const fields =
    typeof context.domain === 'string' && RESTRICTED_DOMAINS.has(context.domain)
      ? keepRestrictedFields(redacted)
      : redacted;

  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...context,
    ...fields,
  };
}

/** Format a record as `[HH:MM:SS] domain | event`. */
export function formatRunLogLine(record: AppLogRecord): string {
  const time = record.timestamp.slice(11, 19);
  const domain = typeof record.domain === 'string' ? record.domain : 'app';
  return `[${time}] ${domain} | ${record.event}`;
}

function emit(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  const out = record.level === 'warn' || record.level === 'error' ? process.stderr : process.stdout;
  out.write(`${line}\n`);
  ndjsonFile.write(line);

  if (record.level !== 'debug') {
    getRunLog()?.lines.push(formatRunLogLine(record));
  }
}

export function createLogger(bound: LogContext = {}): AppLogger {
  const at = (level: LogLevel) => (event: string, data?: LogData) => emit(buildRecord(level, event, bound, data));

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    child: (context: LogContext) => createLogger({ ...bound, ...context }),
  };
}

/**
 * Flush and close the development log file when the process exits.
 */
export function initObservability(): void {
  if (exitHooksInstalled) return;
  exitHooksInstalled = true;

  const closeFile = (): void => ndjsonFile.close();
  process.once('exit', closeFile);
  process.once('SIGINT', closeFile);
  process.once('SIGTERM', closeFile);
}
