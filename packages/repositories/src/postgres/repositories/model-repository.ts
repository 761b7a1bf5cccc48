import { eq } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { models } from '../schema/index.js';
import type { ModelRepository, StoredModel } from '../../interfaces/index.js';
import type { Id } from '@enginehost/protocol';

export class PgModelRepository implements ModelRepository {
  constructor(private db: DbExecutor) {}

  async get(engineId: Id): Promise<StoredModel | null> {
    const [row] = await this.db.select().from(models).where(eq(models.engineId, engineId));
    return row ? this.rowToModel(row) : null;
  }

  async put(engineId: Id, model: unknown): Promise<StoredModel> {
    const updatedAt = new Date();
    const [row] = await this.db
      .insert(models)
      .values({ engineId, model, updatedAt })
      .onConflictDoUpdate({ target: models.engineId, set: { model, updatedAt } })
      .returning();
    return this.rowToModel(row);
  }

  async delete(engineId: Id): Promise<boolean> {
    const rows = await this.db
      .delete(models)
      .where(eq(models.engineId, engineId))
      .returning({ engineId: models.engineId });
    return rows.length > 0;
  }

  private rowToModel(row: typeof models.$inferSelect): StoredModel {
    return {
      engineId: row.engineId,
      model: row.model,
      updatedAt: row.updatedAt.toISOString(),
    };
  }
}
