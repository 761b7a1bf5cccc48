import { eq, and, asc, gt, lte, sql } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { mirrorRecords } from '../schema/index.js';
import type { MirrorRepository } from '../../interfaces/index.js';
import type { Id, MirrorRecord } from '@enginehost/protocol';

export class PgMirrorRepository implements MirrorRepository {
  constructor(private db: DbExecutor) {}

  async append(record: MirrorRecord): Promise<void> {
    await this.db.insert(mirrorRecords).values({
      engineId: record.engineId,
      sequence: record.sequence,
      eventTime: new Date(record.eventTime),
      creationTime: new Date(record.creationTime),
      event: record.event,
    });
  }

  async lastSequence(engineId: Id): Promise<number> {
    const [result] = await this.db
      .select({ max: sql<number | null>`max(${mirrorRecords.sequence})` })
      .from(mirrorRecords)
      .where(eq(mirrorRecords.engineId, engineId));
    return Number(result?.max ?? 0);
  }

  async count(engineId: Id): Promise<number> {
    const [result] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(mirrorRecords)
      .where(eq(mirrorRecords.engineId, engineId));
    return Number(result?.count ?? 0);
  }

  async *stream(engineId: Id, untilSequence?: number): AsyncGenerator<MirrorRecord> {
    // Keyset pagination on sequence
    const batchSize = 1000;
    let after = 0;

    while (true) {
      const conditions = [eq(mirrorRecords.engineId, engineId), gt(mirrorRecords.sequence, after)];
      if (untilSequence !== undefined) {
        conditions.push(lte(mirrorRecords.sequence, untilSequence));
      }

      const batch = await this.db
        .select()
        .from(mirrorRecords)
        .where(and(...conditions))
        .orderBy(asc(mirrorRecords.sequence))
        .limit(batchSize);

      for (const row of batch) {
        yield this.rowToRecord(row);
      }

      if (batch.length < batchSize) break;
      after = batch[batch.length - 1].sequence;
    }
  }

  private rowToRecord(row: typeof mirrorRecords.$inferSelect): MirrorRecord {
    return {
      engineId: row.engineId,
      sequence: row.sequence,
      eventTime: row.eventTime.toISOString(),
      creationTime: row.creationTime.toISOString(),
      event: row.event,
    };
  }
}
