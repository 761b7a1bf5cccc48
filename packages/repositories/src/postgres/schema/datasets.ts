import { pgTable, text, jsonb, bigserial, index } from 'drizzle-orm/pg-core';
import type { Event } from '@enginehost/protocol';
import { engines } from './engines.js';

/**
 * Dataset events table - per-engine accumulated input.
 *
 * Deleted with the engine.
 */
export const datasetEvents = pgTable(
  'dataset_events',
  {
    seq: bigserial('seq', { mode: 'number' }).primaryKey(),
    engineId: text('engine_id')
      .notNull()
      .references(() => engines.id, { onDelete: 'cascade' }),
    entityType: text('entity_type').notNull(),
    entityId: text('entity_id').notNull(),
    eventName: text('event_name').notNull(),
    event: jsonb('event').$type<Event>().notNull(),
  },
  (table) => [
    index('dataset_events_engine_idx').on(table.engineId, table.seq),
    index('dataset_events_entity_idx').on(table.engineId, table.entityType, table.entityId),
  ]
);
