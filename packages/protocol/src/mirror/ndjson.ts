// NDJSON (Newline Delimited JSON) helpers
// File-backed mirror logs store one record per line, append-only.

import { z } from 'zod';
import type { Event, MirrorRecord } from '../types/events.js';
import { jsonValueSchema } from '../validation/schemas.js';

/**
 * One line of a file-backed mirror log.
 * The engine id is implied by the file the line lives in.
 */
export type MirrorLine = {
  sequence: number;
  eventTime: string;
  creationTime: string;
  event: Event;
};

const storedEventSchema: z.ZodType<Event> = z.object({
  entityType: z.string(),
  entityId: z.string(),
  event: z.string(),
  targetEntityType: z.string().optional(),
  targetEntityId: z.string().optional(),
  properties: z.record(jsonValueSchema),
  eventTime: z.string(),
  creationTime: z.string(),
});

export const mirrorLineSchema: z.ZodType<MirrorLine> = z.object({
  sequence: z.number().int().positive(),
  eventTime: z.string(),
  creationTime: z.string(),
  event: storedEventSchema,
});

/**
 * A line that is not complete JSON, as left by an append that never finished.
 */
export type TornLine = {
  /** 1-based line number in the file */
  line: number;
  content: string;
};

export type NdjsonLog<T> = {
  items: T[];
  torn: TornLine[];
};

/**
 * Parse an NDJSON string, checking every line against `schema`.
 *
 * A record is written as one JSON object per line, so an interrupted append
 * can only leave a line that does not parse; such lines are set aside in
 * `torn`. A line that parses but fails `schema` is corruption and throws.
 */
export function parseNdjson<T>(
  content: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): NdjsonLog<T> {
  const log: NdjsonLog<T> = { items: [], torn: [] };
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      log.torn.push({ line: i + 1, content: line });
      continue;
    }

    const checked = schema.safeParse(parsed);
    if (!checked.success) {
      throw new Error(`Invalid NDJSON record at line ${i + 1}: ${checked.error.issues[0].message}`);
    }
    log.items.push(checked.data);
  }

  return log;
}

/**
 * Stringify a single item as an NDJSON line (for appending)
 */
export function stringifyNdjsonLine<T>(item: T): string {
  return JSON.stringify(item) + '\n';
}

export function toMirrorLine(record: MirrorRecord): MirrorLine {
  return {
    sequence: record.sequence,
    eventTime: record.eventTime,
    creationTime: record.creationTime,
    event: record.event,
  };
}

export function fromMirrorLine(engineId: string, line: MirrorLine): MirrorRecord {
  return {
    engineId,
    sequence: line.sequence,
    eventTime: line.eventTime,
    creationTime: line.creationTime,
    event: line.event,
  };
}
