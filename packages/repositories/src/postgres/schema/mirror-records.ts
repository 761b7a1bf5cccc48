import { pgTable, text, timestamp, jsonb, integer, primaryKey } from 'drizzle-orm/pg-core';
import type { Event } from '@enginehost/protocol';

/**
 * Mirror records table - append-only archive of accepted events.
 *
 * Design notes:
 * - No foreign key to engines: the archive outlives the instance
 * - (engine_id, sequence) is the primary key, so a duplicate sequence fails the insert
 */
export const mirrorRecords = pgTable(
  'mirror_records',
  {
    engineId: text('engine_id').notNull(),
    sequence: integer('sequence').notNull(),
    eventTime: timestamp('event_time', { withTimezone: true }).notNull(),
    creationTime: timestamp('creation_time', { withTimezone: true }).notNull(),
    event: jsonb('event').$type<Event>().notNull(),
  },
  (table) => [primaryKey({ columns: [table.engineId, table.sequence] })]
);
