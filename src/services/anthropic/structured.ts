/**
 * Helpers for reading JSON answers out of Claude text responses.
 */

import type { Message, TextBlock } from '@anthropic-ai/sdk/resources/messages';
import { isRecord, type JsonObject } from '../../utils/json.js';

/**
 * Concatenate the text blocks of a response.
 * Returns an empty string when the model produced no text.
 */
export function extractText(response: Pick<Message, 'content'>): string {
  return response.content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('')
    .trim();
}

/**
 * Parse a JSON object from model text.
 * Handles both clean JSON and JSON embedded in markdown.
 */
export function parseJsonObject(text: string): JsonObject | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  let jsonText = fenced ? fenced[1].trim() : text.trim();

  // Prose around a bare object
  if (!fenced && !jsonText.startsWith('{')) {
    const start = jsonText.indexOf('{');
    const end = jsonText.lastIndexOf('}');
    if (start === -1 || end <= start) return null;
    jsonText = jsonText.slice(start, end + 1);
  }

  try {
    const parsed: unknown = JSON.parse(jsonText);
    // Boundary: validate shape before use
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Keep the string entries of an unknown value, trimmed, dropping blanks. */
export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
