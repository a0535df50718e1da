/**
 * Execution history replay.
 *
 * Turns a task's private execution history back into Anthropic messages.
 * The result always alternates user/assistant, starts with the task
 * context and ends on a user turn.
 */

import type {
  ContentBlockParam,
  MessageParam,
  ToolResultBlockParam,
} from '@anthropic-ai/sdk/resources/messages';
import { isRecord } from '../utils/json.js';
import type { AgentState, AssistantEntry, ExecutionEntry, Task } from '../orchestrator/types.js';

export const SKIPPED_TOOL_RESULT = 'Skipped: this call was not executed.';
export const CONTINUE_NUDGE =
  'Continue with the current task. Use the tools, and call submit_task_result when the task is complete.';
const EMPTY_ASSISTANT_TEXT = '(no response)';

/** Parsed tool arguments, or {} when they are not a JSON object. */
export function parseArgumentsLoosely(json: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function assistantMessage(entry: AssistantEntry): MessageParam {
  const content: ContentBlockParam[] = [];
  if (entry.content.trim()) {
    content.push({ type: 'text', text: entry.content });
  }
  for (const call of entry.toolCalls) {
    content.push({
      type: 'tool_use',
      id: call.id,
      name: call.name,
      input: parseArgumentsLoosely(call.arguments),
    });
  }
  if (content.length === 0) {
    content.push({ type: 'text', text: EMPTY_ASSISTANT_TEXT });
  }
  return { role: 'assistant', content };
}

/**
 * Replay history after the opening context message.
 * Tool calls that never got a result are answered as skipped.
 */
export function replayHistory(contextMessage: string, history: ExecutionEntry[]): MessageParam[] {
  const messages: MessageParam[] = [{ role: 'user', content: contextMessage }];

  let pending: AssistantEntry | null = null;
  let results: ToolResultBlockParam[] = [];

  const closeAssistantTurn = (): void => {
    if (!pending) return;
    if (pending.toolCalls.length > 0) {
      const answered = new Set(results.map((result) => result.tool_use_id));
      for (const call of pending.toolCalls) {
        if (!answered.has(call.id)) {
          results.push({ type: 'tool_result', tool_use_id: call.id, content: SKIPPED_TOOL_RESULT });
        }
      }
      messages.push({ role: 'user', content: results });
    }
    pending = null;
    results = [];
  };

  for (const entry of history) {
    switch (entry.kind) {
      case 'assistant':
        closeAssistantTurn();
        messages.push(assistantMessage(entry));
        pending = entry;
        break;
      case 'tool_result':
        results.push({
          type: 'tool_result',
          tool_use_id: entry.toolCallId,
          content: entry.content,
          is_error: entry.isError,
        });
        break;
      case 'note':
        closeAssistantTurn();
        messages.push({ role: 'user', content: CONTINUE_NUDGE });
        break;
    }
  }
  closeAssistantTurn();

  return messages;
}

/** `Task <id>: <description>: <result>` per completed task, ascending id. */
export function formatCompletedTasks(state: AgentState): string {
  return state.plan
    .filter((task) => task.status === 'completed')
    .sort((a, b) => a.id - b.id)
    .map((task) => `Task ${task.id}: ${task.description}: ${task.result}`)
    .join('\n');
}

/** Plain-text rendering of a task's history for the synthesizer. */
export function formatHistoryText(task: Task): string {
  return task.executionHistory
    .map((entry) => {
      switch (entry.kind) {
        case 'assistant': {
          const calls = entry.toolCalls.map((call) => `${call.name}(${call.arguments})`).join(', ');
          return calls ? `[assistant] ${entry.content}\n[tool calls] ${calls}` : `[assistant] ${entry.content}`;
        }
        case 'tool_result':
          return `[${entry.toolName}${entry.isError ? ' error' : ''}] ${entry.content}`;
        case 'note':
          return `[note] ${entry.content}`;
      }
    })
    .join('\n');
}
