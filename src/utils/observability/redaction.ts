/**
 * Redaction applied to every log record before it is written.
 *
 * Secret-looking keys are masked outright. Free-text keys (user messages,
 * prompts, replies) keep only their length.
 */

import { isRecord } from '../json.js';
import type { LogData } from './types.js';

const SECRET_KEY = /(token|secret|password|api[_-]?key|authorization|cookie|credential)/i;
const TEXT_KEY = /^(message|body|content|messages|systemPrompt|prompt|userMessage|reply)$/i;

// Anthropic, Google and bearer-style keys embedded in free text
const INLINE_SECRET = /\b(sk-ant-[A-Za-z0-9_-]{8,}|AIza[A-Za-z0-9_-]{20,}|Bearer\s+[A-Za-z0-9._-]{8,})/g;

const MAX_DEPTH = 6;
const REDACTED = '[REDACTED]';

function maskInline(text: string): string {
  return text.replace(INLINE_SECRET, REDACTED);
}

function redactValue(value: unknown, key: string | undefined, depth: number): unknown {
  if (depth > MAX_DEPTH) return '[TRUNCATED]';

  if (key !== undefined && SECRET_KEY.test(key)) return REDACTED;
  if (key !== undefined && TEXT_KEY.test(key)) {
    if (typeof value === 'string') return `[REDACTED_TEXT len=${value.length}]`;
    if (Array.isArray(value)) return `[REDACTED_ARRAY len=${value.length}]`;
  }

  if (typeof value === 'string') return maskInline(value);
  if (value instanceof Error) {
    return {
      name: value.name,
      message: maskInline(value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }
  if (Array.isArray(value)) return value.map((item) => redactValue(item, key, depth + 1));
  if (isRecord(value)) return redactRecord(value, depth + 1);
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

function redactRecord(record: LogData, depth: number): LogData {
  const result: LogData = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = redactValue(value, key, depth);
  }
  return result;
}

export function redactSecrets(data: LogData): LogData {
  return redactRecord(data, 0);
}

export function safeSnippet(value: string, maxLength = 140): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}...(truncated)`;
}
