/**
 * Executor Agent
 *
 * Runs the bounded tool-calling loop for one task. Each model request is
 * rebuilt from the completed tasks, the current schedule and this task's
 * own history. The task ends when the model calls submit_task_result or
 * when the turn ceiling is reached.
 */

import type { Message, Tool, ToolUseBlock } from '@anthropic-ai/sdk/resources/messages';
import config from '../../config.js';
import { formatCompletedTasks, formatHistoryText, replayHistory } from '../../executor/history.js';
import { requestCompletion } from '../../executor/model.js';
import { executeTool, parseToolArguments } from '../../executor/tool-executor.js';
import {
  MAX_TASK_TURNS,
  MAX_TOOL_ERRORS,
  type Agent,
  type AgentRunContext,
} from '../../executor/types.js';
import type { AgentState, Task, ToolCallRequest } from '../../orchestrator/types.js';
import { completeTask, failTask } from '../../orchestrator/state.js';
import { extractText } from '../../services/anthropic/structured.js';
import { getToolRegistry, type ToolRegistry } from '../../tools/index.js';
import { stringField } from '../../tools/utils.js';
import { AppError, ToolErrorBudgetExceededError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { CONTROL_TOOLS, GENERATE_SCHEDULE, SUBMIT_TASK_RESULT } from './control-tools.js';
import {
  EXECUTOR_AGENT_PROMPT,
  SYNTHESIS_INPUT_TEMPLATE,
  SYNTHESIZER_PROMPT,
  TASK_CONTEXT_TEMPLATE,
} from './prompt.js';

const logger = createLogger({ domain: 'executor-agent' });

/** Maximum tokens for executor turns */
const MAX_TOKENS = 4096;

/** Maximum tokens for a synthesized schedule */
const SYNTHESIS_MAX_TOKENS = 8192;

export interface ExecutorAgentOptions {
  registry?: ToolRegistry;
  model?: string;
  synthesizerModel?: string;
  maxTurns?: number;
  maxToolErrors?: number;
}

export function buildTaskContext(state: AgentState, task: Task): string {
  return TASK_CONTEXT_TEMPLATE
    .replace('{completedTasks}', () => formatCompletedTasks(state))
    .replace('{synthesizedSchedule}', () => state.synthesizedSchedule)
    .replace('{taskDescription}', () => task.description);
}

function toToolCallRequests(response: Message): ToolCallRequest[] {
  return response.content
    .filter((block): block is ToolUseBlock => block.type === 'tool_use')
    .map((block) => ({
      id: block.id,
      name: block.name,
      arguments: JSON.stringify(block.input ?? {}),
    }));
}

export class ExecutorAgent implements Agent<[task: Task]> {
  readonly name = 'executor';

  private readonly registry: ToolRegistry;
  private readonly model: string;
  private readonly synthesizerModel: string;
  private readonly maxTurns: number;
  private readonly maxToolErrors: number;

  constructor(
    private readonly context: AgentRunContext = {},
    options: ExecutorAgentOptions = {}
  ) {
    this.registry = options.registry ?? getToolRegistry();
    this.model = options.model ?? config.models.executor;
    this.synthesizerModel = options.synthesizerModel ?? config.models.synthesizer;
    this.maxTurns = options.maxTurns ?? MAX_TASK_TURNS;
    this.maxToolErrors = options.maxToolErrors ?? MAX_TOOL_ERRORS;
  }

  private tools(): Tool[] {
    return [...this.registry.tools(), ...CONTROL_TOOLS];
  }

  async advance(state: AgentState, task: Task): Promise<AgentState> {
    logger.info('task_started', { taskId: task.id });
    this.context.trace?.phase('task', `Executing task ${task.id}`, {
      description: task.description,
    });

    let errorCount = 0;

    for (let turn = 1; task.status === 'in_progress'; turn++) {
      if (turn > this.maxTurns) {
        failTask(task);
        logger.warn('task_turn_limit', { taskId: task.id, maxTurns: this.maxTurns });
        break;
      }

      const response = await requestCompletion(
        `executor task ${task.id} turn ${turn}`,
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          system: EXECUTOR_AGENT_PROMPT,
          tools: this.tools(),
          messages: replayHistory(buildTaskContext(state, task), task.executionHistory),
        },
        this.context
      );

      const text = extractText(response);
      const toolCalls = toToolCallRequests(response);
      task.executionHistory.push({ kind: 'assistant', content: text, toolCalls });

      if (toolCalls.length === 0) {
        task.executionHistory.push({ kind: 'note', content: text });
        logger.debug('no_tool_call', { taskId: task.id, turn });
        continue;
      }

      for (const call of toolCalls) {
        try {
          await this.handleToolCall(state, task, call);
        } catch (error) {
          if (error instanceof AppError && !error.recoverable) throw error;
          errorCount++;
          if (errorCount > this.maxToolErrors) {
            logger.error('tool_error_budget_exceeded', { taskId: task.id, errorCount });
            throw new ToolErrorBudgetExceededError(task.id, errorCount);
          }
          logger.warn('tool_call_failed', {
            taskId: task.id,
            toolName: call.name,
            errorCount,
            error: errorMessage(error),
          });
          this.context.trace?.toolResult(call.name, errorMessage(error), 0, false);
          task.executionHistory.push({
            kind: 'tool_result',
            toolCallId: call.id,
            toolName: call.name,
            content: `Error: ${errorMessage(error)}`,
            isError: true,
          });
        }

        // Later calls in the same response are left unprocessed
        if (task.status !== 'in_progress') break;
      }
    }

    logger.info('task_finished', { taskId: task.id, status: task.status });
    return state;
  }

  private async handleToolCall(state: AgentState, task: Task, call: ToolCallRequest): Promise<void> {
    this.context.trace?.toolCall(call.name, call.arguments);
    const startTime = Date.now();

    if (call.name === SUBMIT_TASK_RESULT) {
      const args = parseToolArguments(call);
      completeTask(task, stringField(args, 'result'));
      logger.info('task_result_submitted', { taskId: task.id, resultLength: task.result.length });
      return;
    }

    const output = call.name === GENERATE_SCHEDULE
      ? await this.generateSchedule(state, task)
      : await executeTool(this.registry, call, { conversationId: state.conversationId });

    this.context.trace?.toolResult(call.name, output, Date.now() - startTime, true);
    task.executionHistory.push({
      kind: 'tool_result',
      toolCallId: call.id,
      toolName: call.name,
      content: output,
      isError: false,
    });
  }

  /**
   * Secondary synthesis call. Overwrites the synthesized schedule.
   */
  private async generateSchedule(state: AgentState, task: Task): Promise<string> {
    const input = SYNTHESIS_INPUT_TEMPLATE
      .replace('{completedTasks}', () => formatCompletedTasks(state))
      .replace('{synthesizedSchedule}', () => state.synthesizedSchedule)
      .replace('{history}', () => formatHistoryText(task));

    const response = await requestCompletion(
      'synthesizer',
      {
        model: this.synthesizerModel,
        max_tokens: SYNTHESIS_MAX_TOKENS,
        system: SYNTHESIZER_PROMPT,
        messages: [{ role: 'user', content: input }],
      },
      this.context
    );

    state.synthesizedSchedule = extractText(response);
    logger.info('schedule_synthesized', {
      taskId: task.id,
      scheduleLength: state.synthesizedSchedule.length,
    });
    return state.synthesizedSchedule;
  }
}
