import { eq, asc } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { engines } from '../schema/index.js';
import type { EngineRepository } from '../../interfaces/index.js';
import type { EngineMetadata, Id } from '@enginehost/protocol';

/**
 * Insert or replace an engine row. A recreated engine takes every column
 * from the new metadata, `createdAt` included.
 */
export function upsertEngine(db: DbExecutor, metadata: EngineMetadata) {
  const values = {
    id: metadata.engineId,
    engineFactory: metadata.engineFactory,
    params: metadata.params,
    mirrorType: metadata.mirrorType ?? null,
    createdAt: new Date(metadata.createdAt),
    updatedAt: new Date(metadata.updatedAt),
  };

  return db
    .insert(engines)
    .values(values)
    .onConflictDoUpdate({
      target: engines.id,
      set: {
        engineFactory: values.engineFactory,
        params: values.params,
        mirrorType: values.mirrorType,
        createdAt: values.createdAt,
        updatedAt: values.updatedAt,
      },
    })
    .returning();
}

export class PgEngineRepository implements EngineRepository {
  constructor(private db: DbExecutor) {}

  async save(metadata: EngineMetadata): Promise<EngineMetadata> {
    const [row] = await upsertEngine(this.db, metadata);

    return this.rowToMetadata(row);
  }

  async get(engineId: Id): Promise<EngineMetadata | null> {
    const [row] = await this.db.select().from(engines).where(eq(engines.id, engineId));
    return row ? this.rowToMetadata(row) : null;
  }

  async list(): Promise<EngineMetadata[]> {
    const rows = await this.db.select().from(engines).orderBy(asc(engines.createdAt));
    return rows.map((r) => this.rowToMetadata(r));
  }

  async delete(engineId: Id): Promise<boolean> {
    const rows = await this.db
      .delete(engines)
      .where(eq(engines.id, engineId))
      .returning({ id: engines.id });
    return rows.length > 0;
  }

  private rowToMetadata(row: typeof engines.$inferSelect): EngineMetadata {
    return {
      engineId: row.id,
      engineFactory: row.engineFactory,
      params: row.params,
      mirrorType: row.mirrorType ?? undefined,
      createdAt: row.createdAt.toISOString(),
      updatedAt: row.updatedAt.toISOString(),
    };
  }
}
