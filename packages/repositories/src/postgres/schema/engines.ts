import { pgTable, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

/**
 * Engines table - one metadata record per live instance.
 *
 * Read in full at process start to rebuild the live set.
 */
export const engines = pgTable(
  'engines',
  {
    id: text('id').primaryKey(),
    engineFactory: text('engine_factory').notNull(),
    params: jsonb('params').$type<Record<string, unknown>>().notNull(),
    mirrorType: text('mirror_type').$type<'file' | 'db'>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('engines_created_idx').on(table.createdAt)]
);
