/**
 * Unit tests for validateInput utility.
 */

import { describe, it, expect } from 'vitest';
import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import { stringField, validateInput } from '../../../src/tools/utils.js';

const schema: Tool.InputSchema = {
  type: 'object',
  properties: {
    query: { type: 'string' },
    limit: { type: 'integer' },
    score: { type: 'number' },
    tags: { type: 'array' },
    filters: { type: 'object' },
    exact: { type: 'boolean' },
  },
  required: ['query'],
};

describe('validateInput', () => {
  describe('required fields', () => {
    it('returns error when required field is missing', () => {
      expect(validateInput({}, schema)).toBe('query is required.');
    });

    it('returns error when required field is null', () => {
      expect(validateInput({ query: null }, schema)).toBe('query is required.');
    });

    it('passes when required field is present', () => {
      expect(validateInput({ query: 'keynote' }, schema)).toBeNull();
    });
  });

  describe('type checking', () => {
    it('rejects number where string expected', () => {
      expect(validateInput({ query: 42 }, schema)).toBe('query must be a string.');
    });

    it('distinguishes integers from numbers', () => {
      expect(validateInput({ query: 'x', limit: 1.5 }, schema)).toBe('limit must be a integer.');
      expect(validateInput({ query: 'x', limit: 3, score: 1.5 }, schema)).toBeNull();
    });

    it('checks arrays and objects', () => {
      expect(validateInput({ query: 'x', tags: 'ml' }, schema)).toBe('tags must be a array.');
      expect(validateInput({ query: 'x', filters: [] }, schema)).toBe('filters must be a object.');
      expect(validateInput({ query: 'x', tags: ['ml'], filters: { day: 1 } }, schema)).toBeNull();
    });

    it('rejects string where boolean expected', () => {
      expect(validateInput({ query: 'x', exact: 'yes' }, schema)).toBe('exact must be a boolean.');
    });

    it('ignores fields without a schema', () => {
      expect(validateInput({ query: 'x', session_id: 7 }, schema)).toBeNull();
    });
  });
});

describe('stringField', () => {
  it('trims strings and defaults to empty', () => {
    expect(stringField({ query: '  rag  ' }, 'query')).toBe('rag');
    expect(stringField({ query: 3 }, 'query')).toBe('');
    expect(stringField({}, 'query')).toBe('');
  });
});
