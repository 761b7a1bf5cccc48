import { pgTable, text, timestamp, jsonb } from 'drizzle-orm/pg-core';
import { engines } from './engines.js';

/**
 * Models table - the committed model artifact per engine.
 */
export const models = pgTable('models', {
  engineId: text('engine_id')
    .primaryKey()
    .references(() => engines.id, { onDelete: 'cascade' }),
  model: jsonb('model').$type<unknown>(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
