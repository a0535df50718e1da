/**
 * Schedule document parsing.
 *
 * Accepts the conference schedule export format, with or without the
 * `schedule` / `conference` envelope:
 *
 *   { schedule?: { conference: { title, days: [{ date, rooms: { <room>: [talk] } }] } } }
 *   { days: [...] }
 */

import { isRecord, type JsonObject } from '../utils/json.js';
import type { ScheduleDocument, TalkMetadata } from './types.js';

const DESCRIPTION_LIMIT = 4000;
const BIOGRAPHY_LIMIT = 1500;
const TITLE_LIMIT = 200;

/** Field value as text; absent or non-scalar values become ''. */
function text(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function truthy(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '' && value !== 0 && value !== false;
}

function scheduleRoot(data: JsonObject): JsonObject {
  return isRecord(data.schedule) ? data.schedule : data;
}

export function conferenceTitle(data: JsonObject): string {
  const root = scheduleRoot(data);
  const conference = isRecord(root.conference) ? root.conference : {};
  return text(conference.title) || 'Conference';
}

/** Day objects of the schedule; [] when the document has none. */
export function scheduleDays(data: JsonObject): JsonObject[] {
  const root = scheduleRoot(data);
  const conference = isRecord(root.conference) ? root.conference : {};
  const days = Array.isArray(conference.days) && conference.days.length > 0
    ? conference.days
    : root.days;
  return Array.isArray(days) ? days.filter(isRecord) : [];
}

/** [roomName, talks] pairs in document order. */
function dayRooms(day: JsonObject): Array<[string, JsonObject[]]> {
  if (!isRecord(day.rooms)) return [];
  return Object.entries(day.rooms).map(([room, talks]): [string, JsonObject[]] => [
    room,
    Array.isArray(talks) ? talks.filter(isRecord) : [],
  ]);
}

/**
 * Flatten one talk into a searchable text block.
 */
export function talkToText(talk: JsonObject): string {
  const parts = [
    `Title: ${text(talk.title)}`,
    `Track: ${text(talk.track)}`,
    `Type: ${text(talk.type)}`,
    `Room: ${text(talk.room)}`,
    `Date: ${text(talk.date)}`,
    `Start: ${text(talk.start)}`,
    `Duration: ${text(talk.duration)}`,
    `Abstract: ${text(talk.abstract)}`,
    `Description: ${text(talk.description).slice(0, DESCRIPTION_LIMIT)}`,
  ];

  const persons = Array.isArray(talk.persons) ? talk.persons.filter(isRecord) : [];
  persons.forEach((person, i) => {
    parts.push(`Speaker ${i + 1}: ${text(person.public_name) || text(person.name)}`);
    const biography = text(person.biography);
    if (biography) {
      parts.push(`  Biography: ${biography.slice(0, BIOGRAPHY_LIMIT)}`);
    }
  });

  return parts.join('\n');
}

/** First truthy guid or code, else the id as given (0 included), else date, room and start. */
function talkId(talk: JsonObject, date: string, room: string): string {
  const key = [talk.guid, talk.code].find(truthy) ?? talk.id;
  return key !== undefined && key !== null ? text(key) : `${date}_${room}_${text(talk.start)}`;
}

/**
 * One document per talk, in document order.
 * Repeated ids get a `#n` suffix so every document keeps its own row.
 */
export function scheduleDocuments(data: JsonObject): ScheduleDocument[] {
  const documents: ScheduleDocument[] = [];
  const seen = new Map<string, number>();

  for (const day of scheduleDays(data)) {
    const date = text(day.date);
    for (const [room, talks] of dayRooms(day)) {
      for (const talk of talks) {
        const baseId = talkId(talk, date, room);
        const occurrences = (seen.get(baseId) ?? 0) + 1;
        seen.set(baseId, occurrences);

        const metadata: TalkMetadata = {
          room,
          date,
          start: text(talk.start),
          track: text(talk.track),
          title: text(talk.title).slice(0, TITLE_LIMIT),
        };

        documents.push({
          id: occurrences === 1 ? baseId : `${baseId}#${occurrences}`,
          text: talkToText(talk),
          metadata,
        });
      }
    }
  }

  return documents;
}

/**
 * Compact overview of the whole program, grouped by day with rooms in
 * lexicographic order.
 */
export function scheduleOverview(data: JsonObject): string {
  const lines = [`# ${conferenceTitle(data)}`, ''];

  for (const day of scheduleDays(data)) {
    lines.push(`## ${text(day.date)}`, '');
    const rooms = dayRooms(day).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [room, talks] of rooms) {
      for (const talk of talks) {
        lines.push(`- ${text(talk.start)} | ${room} | ${text(talk.track)}`);
        lines.push(`  ${text(talk.title)}`);
      }
    }
    lines.push('');
  }

  return lines.join('\n');
}
