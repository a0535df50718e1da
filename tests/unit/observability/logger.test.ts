import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  createLogger,
  formatRunLogLine,
  withLogContext,
  withRunLog,
  type RunLogCollector,
} from '../../../src/utils/observability/index.js';

const envSnapshot = { ...process.env };

afterEach(() => {
  process.env = { ...envSnapshot };
  vi.restoreAllMocks();
});

function captureStdout(): string[] {
  const lines: string[] = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    lines.push(String(chunk).trim());
    return true;
  });
  return lines;
}

describe('observability logger', () => {
  it('writes redacted JSON logs to local file in development', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'concierge-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'development';
    process.env.APP_LOG_FILE = logFile;

    const logger = createLogger({ domain: 'unit-test' });
    const stdoutSpy = vi.spyOn(process.stdout, 'write');

    await withLogContext({ requestId: 'req_test_123' }, async () => {
      const body = 'this should not be stored in clear text';
      logger.info('test_event', {
        token: 'super-secret-token',
        body,
      });
    });

    await vi.waitFor(() => {
      expect(fs.existsSync(logFile)).toBe(true);
      const content = fs.readFileSync(logFile, 'utf-8');
      expect(content.trim().length).toBeGreaterThan(0);
    }, { timeout: 1000 });

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    const payload = JSON.parse(lines[0]) as Record<string, unknown>;

    expect(payload.event).toBe('test_event');
    expect(payload.level).toBe('info');
    expect(payload.domain).toBe('unit-test');
    expect(payload.requestId).toBe('req_test_123');
    expect(payload.token).toBe('[REDACTED]');
    expect(payload.body).toBe('[REDACTED_TEXT len=39]');
    expect(stdoutSpy).toHaveBeenCalled();
  });

  it('does not write local file sink in production by default', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'concierge-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'production';
    process.env.APP_LOG_FILE = logFile;
    captureStdout();

    const logger = createLogger({ domain: 'unit-test' });
    logger.info('prod_event', { ok: true });

    expect(fs.existsSync(logFile)).toBe(false);
  });

  it('keeps only allowlisted fields in high-risk domains', () => {
    process.env.NODE_ENV = 'test';
    const lines = captureStdout();

    createLogger({ domain: 'turn-handler' }).info('turn_persisted', {
      sessionId: 'session-1',
      messageLength: 12,
      hasSchedule: true,
      scheduleComplete: false,
      query: 'AI talks near the river',
    });

    const payload = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(payload.sessionId).toBe('session-1');
    expect(payload.messageLength).toBe(12);
    expect(payload.hasSchedule).toBe(true);
    expect(payload.scheduleComplete).toBe(false);
    expect(payload.query).toBeUndefined();
  });

  it('leaves other domains unfiltered', () => {
    process.env.NODE_ENV = 'test';
    const lines = captureStdout();

    createLogger({ domain: 'retrieval' }).info('query_complete', { candidateCount: 4 });

    expect(JSON.parse(lines[0])).toMatchObject({ domain: 'retrieval', candidateCount: 4 });
  });

  it('collects run log lines except debug inside withRunLog', () => {
    process.env.NODE_ENV = 'test';
    captureStdout();
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger({ domain: 'executor-agent' });
    const collector: RunLogCollector = { lines: [] };

    withRunLog(collector, () => {
      logger.info('task_started', { taskId: 0 });
      logger.debug('no_tool_call', { taskId: 0 });
      logger.warn('task_turn_limit', { taskId: 0 });
    });
    logger.info('outside_run');

    expect(collector.lines).toHaveLength(2);
    expect(collector.lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] executor-agent \| task_started$/);
    expect(collector.lines[1].endsWith('executor-agent | task_turn_limit')).toBe(true);
  });
});

describe('formatRunLogLine', () => {
  it('formats time, domain and event', () => {
    expect(
      formatRunLogLine({ timestamp: '2026-03-01T09:15:42.123Z', level: 'info', event: 'schedule_indexed', domain: 'retrieval' })
    ).toBe('[09:15:42] retrieval | schedule_indexed');
  });

  it('defaults the domain', () => {
    expect(formatRunLogLine({ timestamp: '2026-03-01T09:15:42.123Z', level: 'info', event: 'x' })).toBe(
      '[09:15:42] app | x'
    );
  });
});
