import { describe, it, expect, beforeEach } from 'vitest';
import { PlanningAgent, parsePlanDescription } from '../../../src/agents/planning/index.js';
import { createAgentState } from '../../../src/orchestrator/state.js';
import { LlmRefusalError, StructuredOutputError } from '../../../src/utils/errors.js';
import {
  clearMockState,
  createTextResponse,
  getCreateCalls,
  setMockResponses,
} from '../../mocks/anthropic.js';

beforeEach(() => {
  clearMockState();
});

describe('parsePlanDescription', () => {
  it('trims entries and drops blanks and non-strings', () => {
    expect(parsePlanDescription('{"plan_description": [" Find AI talks ", "", 3, "Build itinerary"]}')).toEqual([
      'Find AI talks',
      'Build itinerary',
    ]);
  });

  it('rejects a missing array', () => {
    expect(() => parsePlanDescription('{"plan": ["a"]}')).toThrow(StructuredOutputError);
    expect(() => parsePlanDescription('{"plan_description": "a"}')).toThrow(StructuredOutputError);
  });
});

describe('PlanningAgent', () => {
  it('sets planDescription from the query', async () => {
    setMockResponses([
      createTextResponse('{"plan_description": ["Find AI talks on day 1", "Find lunch near the venue"]}'),
    ]);
    const state = createAgentState('conv-1');
    state.queryToPlan = 'AI talks, lunch nearby';

    const result = await new PlanningAgent().advance(state);

    expect(result.planDescription).toEqual(['Find AI talks on day 1', 'Find lunch near the venue']);
    expect(result.plan).toEqual([]);
    expect(getCreateCalls()[0].messages).toEqual([{ role: 'user', content: 'User: AI talks, lunch nearby' }]);
  });

  it('keeps $ sequences in the query literally', async () => {
    setMockResponses([createTextResponse('{"plan_description": ["a"]}')]);
    const state = createAgentState('conv-1');
    state.queryToPlan = 'budget $& under 100';

    await new PlanningAgent().advance(state);

    expect(getCreateCalls()[0].messages).toEqual([{ role: 'user', content: 'User: budget $& under 100' }]);
  });

  it('raises a refusal on an empty answer', async () => {
    setMockResponses([createTextResponse('   ')]);
    const state = createAgentState('conv-1');
    state.queryToPlan = 'x';

    await expect(new PlanningAgent().advance(state)).rejects.toThrow(LlmRefusalError);
  });
});
