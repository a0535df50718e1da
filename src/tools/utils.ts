/**
 * Shared utilities for tool handlers.
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import { isRecord } from '../utils/json.js';
import type { ToolInput } from './types.js';

type JsonType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

function matchesType(value: unknown, type: JsonType): boolean {
  switch (type) {
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isRecord(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    default:
      return typeof value === type;
  }
}

function isJsonType(value: unknown): value is JsonType {
  return (
    value === 'string' || value === 'number' || value === 'integer' ||
    value === 'boolean' || value === 'array' || value === 'object'
  );
}

/**
 * Check tool input against the required fields and property types of
 * its input schema. Returns an error message, or null if input is valid.
 */
export function validateInput(input: ToolInput, schema: Tool.InputSchema): string | null {
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const required = Array.isArray(schema.required) ? schema.required : [];

  for (const field of required) {
    if (typeof field !== 'string') continue;
    const value = input[field];
    if (value === undefined || value === null) {
      return `${field} is required.`;
    }
  }

  for (const [field, schema] of Object.entries(properties)) {
    const value = input[field];
    if (value === undefined || value === null || !isRecord(schema)) continue;
    if (isJsonType(schema.type) && !matchesType(value, schema.type)) {
      return `${field} must be a ${schema.type}.`;
    }
  }

  return null;
}

/**
 * Read a string field, trimmed; '' when absent.
 */
export function stringField(input: ToolInput, field: string): string {
  const value = input[field];
  return typeof value === 'string' ? value.trim() : '';
}
