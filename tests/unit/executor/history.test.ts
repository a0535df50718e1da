import { describe, it, expect } from 'vitest';
import {
  CONTINUE_NUDGE,
  SKIPPED_TOOL_RESULT,
  formatCompletedTasks,
  formatHistoryText,
  parseArgumentsLoosely,
  replayHistory,
} from '../../../src/executor/history.js';
import { buildPlan, completeTask, createAgentState, failTask, startTask } from '../../../src/orchestrator/state.js';
import type { ExecutionEntry, Task } from '../../../src/orchestrator/types.js';

describe('replayHistory', () => {
  it('starts with the context message', () => {
    expect(replayHistory('Current task: find talks', [])).toEqual([
      { role: 'user', content: 'Current task: find talks' },
    ]);
  });

  it('pairs tool calls with their results in one user turn', () => {
    const history: ExecutionEntry[] = [
      {
        kind: 'assistant',
        content: 'Looking up',
        toolCalls: [
          { id: 'a', name: 'rag_search', arguments: '{"query":"ml"}' },
          { id: 'b', name: 'get_schedule_overview', arguments: '{}' },
        ],
      },
      { kind: 'tool_result', toolCallId: 'a', toolName: 'rag_search', content: 'talks', isError: false },
      { kind: 'tool_result', toolCallId: 'b', toolName: 'get_schedule_overview', content: 'Error: x', isError: true },
    ];

    expect(replayHistory('ctx', history)).toEqual([
      { role: 'user', content: 'ctx' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Looking up' },
          { type: 'tool_use', id: 'a', name: 'rag_search', input: { query: 'ml' } },
          { type: 'tool_use', id: 'b', name: 'get_schedule_overview', input: {} },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'a', content: 'talks', is_error: false },
          { type: 'tool_result', tool_use_id: 'b', content: 'Error: x', is_error: true },
        ],
      },
    ]);
  });

  it('answers unprocessed calls as skipped', () => {
    const history: ExecutionEntry[] = [
      {
        kind: 'assistant',
        content: '',
        toolCalls: [
          { id: 'a', name: 'submit_task_result', arguments: '{"result":"done"}' },
          { id: 'b', name: 'rag_search', arguments: '{"query":"x"}' },
        ],
      },
    ];

    const messages = replayHistory('ctx', history);

    expect(messages[2]).toEqual({
      role: 'user',
      content: [
        { type: 'tool_result', tool_use_id: 'a', content: SKIPPED_TOOL_RESULT },
        { type: 'tool_result', tool_use_id: 'b', content: SKIPPED_TOOL_RESULT },
      ],
    });
  });

  it('replays a text-only turn followed by a nudge', () => {
    const history: ExecutionEntry[] = [
      { kind: 'assistant', content: 'I will think about it.', toolCalls: [] },
      { kind: 'note', content: 'I will think about it.' },
    ];

    expect(replayHistory('ctx', history)).toEqual([
      { role: 'user', content: 'ctx' },
      { role: 'assistant', content: [{ type: 'text', text: 'I will think about it.' }] },
      { role: 'user', content: CONTINUE_NUDGE },
    ]);
  });

  it('gives an empty assistant turn placeholder text', () => {
    const history: ExecutionEntry[] = [
      { kind: 'assistant', content: '  ', toolCalls: [] },
      { kind: 'note', content: '' },
    ];

    expect(replayHistory('ctx', history)[1]).toEqual({
      role: 'assistant',
      content: [{ type: 'text', text: '(no response)' }],
    });
  });
});

describe('parseArgumentsLoosely', () => {
  it('returns {} for anything but an object', () => {
    expect(parseArgumentsLoosely('{"a":1}')).toEqual({ a: 1 });
    expect(parseArgumentsLoosely('"text"')).toEqual({});
    expect(parseArgumentsLoosely('{broken')).toEqual({});
  });
});

describe('formatCompletedTasks', () => {
  it('lists only completed tasks in id order', () => {
    const state = createAgentState('conv-1');
    state.plan = buildPlan(['Find talks', 'Find lunch', 'Build schedule']);
    state.plan.forEach(startTask);
    completeTask(state.plan[2], 'draft');
    failTask(state.plan[1]);
    completeTask(state.plan[0], '3 talks');

    expect(formatCompletedTasks(state)).toBe('Task 0: Find talks: 3 talks\nTask 2: Build schedule: draft');
  });

  it('is empty without completed tasks', () => {
    expect(formatCompletedTasks(createAgentState('conv-1'))).toBe('');
  });
});

describe('formatHistoryText', () => {
  it('renders each entry on its own line', () => {
    const task: Task = {
      id: 0,
      description: 'Find talks',
      status: 'in_progress',
      result: '',
      executionHistory: [
        { kind: 'assistant', content: 'Searching', toolCalls: [{ id: 'a', name: 'rag_search', arguments: '{"query":"ml"}' }] },
        { kind: 'tool_result', toolCallId: 'a', toolName: 'rag_search', content: 'two talks', isError: false },
        { kind: 'tool_result', toolCallId: 'b', toolName: 'google_web_search', content: 'Error: down', isError: true },
        { kind: 'note', content: 'thinking' },
      ],
    };

    expect(formatHistoryText(task)).toBe(
      [
        '[assistant] Searching',
        '[tool calls] rag_search({"query":"ml"})',
        '[rag_search] two talks',
        '[google_web_search error] Error: down',
        '[note] thinking',
      ].join('\n')
    );
  });
});
