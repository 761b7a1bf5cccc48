import { eq, and, asc, gt, inArray, sql } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { datasetEvents } from '../schema/index.js';
import type { DatasetRepository, DatasetFilter } from '../../interfaces/index.js';
import type { Event, Id } from '@enginehost/protocol';

export class PgDatasetRepository implements DatasetRepository {
  constructor(private db: DbExecutor) {}

  async append(engineId: Id, event: Event): Promise<number> {
    await this.db.insert(datasetEvents).values({
      engineId,
      entityType: event.entityType,
      entityId: event.entityId,
      eventName: event.event,
      event,
    });
    return this.count(engineId);
  }

  async list(engineId: Id, filter: DatasetFilter = {}): Promise<Event[]> {
    const query = this.db
      .select()
      .from(datasetEvents)
      .where(and(...this.conditions(engineId, filter)))
      .orderBy(asc(datasetEvents.seq))
      .$dynamic();

    if (filter.limit !== undefined) {
      query.limit(filter.limit);
    }

    const rows = await query;
    return rows.map((r) => r.event);
  }

  async count(engineId: Id): Promise<number> {
    const [result] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(datasetEvents)
      .where(eq(datasetEvents.engineId, engineId));
    return Number(result?.count ?? 0);
  }

  async *stream(engineId: Id, filter: DatasetFilter = {}): AsyncGenerator<Event> {
    const batchSize = 1000;
    let after = 0;
    let remaining = filter.limit ?? Number.POSITIVE_INFINITY;

    while (remaining > 0) {
      const batch = await this.db
        .select()
        .from(datasetEvents)
        .where(and(...this.conditions(engineId, filter), gt(datasetEvents.seq, after)))
        .orderBy(asc(datasetEvents.seq))
        .limit(Math.min(batchSize, remaining));

      for (const row of batch) {
        yield row.event;
      }

      remaining -= batch.length;
      if (batch.length < batchSize) break;
      after = batch[batch.length - 1].seq;
    }
  }

  async clear(engineId: Id): Promise<number> {
    const rows = await this.db
      .delete(datasetEvents)
      .where(eq(datasetEvents.engineId, engineId))
      .returning({ seq: datasetEvents.seq });
    return rows.length;
  }

  private conditions(engineId: Id, filter: DatasetFilter) {
    const conditions = [eq(datasetEvents.engineId, engineId)];

    if (filter.entityType !== undefined) {
      conditions.push(eq(datasetEvents.entityType, filter.entityType));
    }

    if (filter.entityId !== undefined) {
      conditions.push(eq(datasetEvents.entityId, filter.entityId));
    }

    if (filter.events && filter.events.length > 0) {
      conditions.push(inArray(datasetEvents.eventName, filter.events));
    }

    return conditions;
  }
}
