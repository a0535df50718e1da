/**
 * Per-turn trace files for local debugging.
 *
 * In development every turn gets a readable log at
 * `TRACE_LOG_DIR/<date>/<HH-mm-ss>_<runId>.log` holding each model request
 * and response, each tool call and the orchestrator's phase changes.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import config from '../config.js';
import { errorMessage } from './errors.js';
import { createLogger, safeSnippet } from './observability/index.js';

const logger = createLogger({ domain: 'trace' });

export type TraceLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type TracePhase = 'intake' | 'planning' | 'task' | 'synthesis' | 'guardrail';

/** The request fields a trace records; SDK request params satisfy it. */
export interface TracedRequest {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: string; content: unknown }>;
  tools?: Array<{ name: string }>;
}

/** The response fields a trace records; an SDK Message satisfies it. */
export interface TracedResponse {
  stop_reason: string | null;
  content: Array<{ type: string; text?: string; name?: string; input?: unknown }>;
  usage?: { input_tokens: number; output_tokens: number };
}

export interface TraceSummary {
  durationMs: number;
  llmCalls: number;
  toolCalls: number;
  inputTokens: number;
  outputTokens: number;
}

const RULE = '='.repeat(80);
const TOOL_OUTPUT_LIMIT = 1000;

function indent(text: string, depth = 1): string {
  const pad = '  '.repeat(depth);
  return text
    .split('\n')
    .map((line) => pad + line)
    .join('\n');
}

function render(value: unknown, pretty = false): string {
  if (typeof value === 'string') return value;
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

/** HH:mm:ss.mmm */
function clock(): string {
  return new Date().toTimeString().slice(0, 12);
}

function traceFilePath(runId: string): string {
  const now = new Date();
  const dir = join(process.env.TRACE_LOG_DIR || './logs', now.toISOString().slice(0, 10));
  mkdirSync(dir, { recursive: true });
  const time = now.toTimeString().slice(0, 8).replace(/:/g, '-');
  return join(dir, `${time}_${runId}.log`);
}

export class TraceLogger {
  private readonly file: string | null;
  private readonly startedAt = Date.now();
  private llmCalls = 0;
  private toolCalls = 0;
  private inputTokens = 0;
  private outputTokens = 0;

  constructor(
    private readonly runId: string,
    conversationId: string,
    enabled: boolean = config.nodeEnv === 'development'
  ) {
    this.file = enabled ? traceFilePath(runId) : null;
    this.entry([RULE, `TRACE START | ${new Date().toISOString()} | ${conversationId} | ${runId}`, RULE]);
  }

  get enabled(): boolean {
    return this.file !== null;
  }

  log(level: TraceLevel, message: string, details: Record<string, unknown> = {}): void {
    if (!this.enabled) return;
    const fields = Object.entries(details).map(([key, value]) => `  ${key}: ${render(value)}`);
    this.entry([`[${clock()}] ${level.padEnd(5)} ${message}`, ...fields]);
  }

  phase(phase: TracePhase, message: string, details?: Record<string, unknown>): void {
    this.log('INFO', `[${phase}] ${message}`, details);
  }

  llmRequest(label: string, request: TracedRequest): void {
    if (!this.enabled) return;
    this.llmCalls++;

    const tools = request.tools?.map((tool) => tool.name).join(', ') || '(none)';
    this.entry([
      `[${clock()}] DEBUG LLM REQUEST [${label}]`,
      `  Model: ${request.model}`,
      `  Max tokens: ${request.max_tokens}`,
      `  Tools: ${tools}`,
      '',
      '  --- SYSTEM PROMPT ---',
      indent(request.system),
      '  --- MESSAGES ---',
      ...request.messages.map((message) => `  [${message.role}]: ${render(message.content, true)}`),
      '  --- END ---',
    ]);
  }

  llmResponse(label: string, response: TracedResponse, durationMs: number): void {
    if (!this.enabled) return;

    const inputTokens = response.usage?.input_tokens ?? 0;
    const outputTokens = response.usage?.output_tokens ?? 0;
    this.inputTokens += inputTokens;
    this.outputTokens += outputTokens;

    const blocks = response.content.flatMap((block) => {
      if (block.type === 'text') return [indent(block.text ?? '')];
      if (block.type === 'tool_use') {
        return [`  [TOOL CALL] ${block.name ?? ''}`, indent(render(block.input ?? {}, true), 2)];
      }
      return [];
    });

    this.entry([
      `[${clock()}] DEBUG LLM RESPONSE [${label}] (${durationMs}ms)`,
      `  Stop reason: ${response.stop_reason ?? '(none)'}`,
      `  Tokens: ${inputTokens} in / ${outputTokens} out`,
      '',
      ...blocks,
    ]);
  }

  toolCall(name: string, rawArguments: string): void {
    if (!this.enabled) return;
    this.toolCalls++;
    this.entry([`[${clock()}] DEBUG TOOL CALL: ${name}`, `  Input: ${rawArguments}`]);
  }

  toolResult(name: string, output: string, durationMs: number, ok: boolean): void {
    if (!this.enabled) return;
    const heading = ok ? 'DEBUG TOOL RESULT' : 'ERROR TOOL FAILED';
    this.entry([
      `[${clock()}] ${heading}: ${name} (${durationMs}ms)`,
      '  Output:',
      indent(safeSnippet(output, TOOL_OUTPUT_LIMIT)),
    ]);
  }

  close(status: 'SUCCESS' | 'FAILED'): void {
    if (!this.enabled) return;
    const summary = this.summary();
    this.entry([
      RULE,
      `TRACE END | ${new Date().toISOString()} | ${this.runId}`,
      `Duration: ${summary.durationMs}ms | LLM calls: ${summary.llmCalls} | Tool calls: ${summary.toolCalls} | ` +
        `Tokens: ${summary.inputTokens} in / ${summary.outputTokens} out`,
      `Status: ${status}`,
      RULE,
    ]);
  }

  summary(): TraceSummary {
    return {
      durationMs: Date.now() - this.startedAt,
      llmCalls: this.llmCalls,
      toolCalls: this.toolCalls,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
    };
  }

  private entry(lines: string[]): void {
    if (!this.file) return;
    try {
      appendFileSync(this.file, `${lines.join('\n')}\n\n`);
    } catch (error) {
      logger.warn('trace_write_failed', { runId: this.runId, error: errorMessage(error) });
    }
  }
}

/**
 * Trace logger for one turn. Writes nothing outside development.
 */
export function createTraceLogger(runId: string, conversationId: string): TraceLogger {
  return new TraceLogger(runId, conversationId);
}
