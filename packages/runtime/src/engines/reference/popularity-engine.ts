// Periodic reference engine: ranks items by how often they were the target
// of the configured events. With `realtimeProperties`, `$set`/`$unset` on
// items update the served model between training runs.

import { z } from 'zod';
import {
  jsonValueSchema,
  type EngineCapabilities,
  type Event,
  type JsonValue,
} from '@enginehost/protocol';
import { UnsupportedOperationError } from '../../errors.js';
import { BaseEngine } from '../base-engine.js';

export const POPULARITY_ENGINE_TYPE = 'reference.popularity';

const indicatorSchema = z.object({ name: z.string().min(1) }).passthrough();

export const popularityAlgorithmSchema = z
  .object({
    eventNames: z.array(z.string().min(1)).min(1).optional(),
    indicators: z.array(indicatorSchema).min(1).optional(),
    num: z.number().int().positive().default(20),
    blacklistEvents: z.array(z.string().min(1)).optional(),
    returnSelf: z.boolean().default(false),
    realtimeProperties: z.boolean().default(false),
  })
  .passthrough()
  .refine((a) => a.eventNames !== undefined || a.indicators !== undefined, {
    message: 'Must have either "eventNames" or "indicators"',
  })
  .transform((a) => {
    const modelEventNames = a.indicators ? a.indicators.map((i) => i.name) : (a.eventNames ?? []);
    return {
      ...a,
      modelEventNames,
      // Items the user already converted on are not recommended back
      blacklistEvents: a.blacklistEvents ?? modelEventNames.slice(0, 1),
    };
  });

export type PopularityAlgorithm = z.output<typeof popularityAlgorithmSchema>;

const rankedItemSchema = z.object({ item: z.string(), score: z.number() });

const popularityModelSchema = z.object({
  ranking: z.array(rankedItemSchema),
  properties: z.record(z.record(jsonValueSchema)),
  eventCount: z.number().int().nonnegative(),
  trainedAt: z.string().optional(),
});

export type PopularityModel = z.output<typeof popularityModelSchema>;

const popularityQuerySchema = z.object({
  user: z.string().min(1).optional(),
  item: z.string().min(1).optional(),
  num: z.number().int().positive().optional(),
});

export type RankedItem = {
  item: string;
  score: number;
  properties?: Record<string, JsonValue>;
};

export type PopularityQueryResult = { result: RankedItem[] };

function compareRanked(a: RankedItem, b: RankedItem): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.item === b.item) return 0;
  return a.item < b.item ? -1 : 1;
}

export class PopularityEngine extends BaseEngine<PopularityAlgorithm> {
  protected readonly algorithmSchema = popularityAlgorithmSchema;

  get capabilities(): EngineCapabilities {
    if (this.initialized && this.config.realtimeProperties) {
      return { incrementalUpdate: true, batchTrain: true };
    }
    return { incrementalUpdate: false, batchTrain: true };
  }

  async input(event: Event): Promise<void> {
    await this.ctx.datasets.append(event);
  }

  async train(): Promise<PopularityModel> {
    const { modelEventNames } = this.config;
    const previous = await this.loadModel();
    const counts = new Map<string, number>();
    let eventCount = 0;

    for await (const event of this.ctx.datasets.stream({ events: modelEventNames })) {
      if (event.targetEntityId === undefined) continue;
      counts.set(event.targetEntityId, (counts.get(event.targetEntityId) ?? 0) + 1);
      eventCount++;
    }

    const ranking = Array.from(counts, ([item, score]) => ({ item, score })).sort(compareRanked);
    this.ctx.logger.debug('Popularity model built', { items: ranking.length, eventCount });

    return {
      ranking,
      properties: previous?.properties ?? {},
      eventCount,
      trainedAt: new Date().toISOString(),
    };
  }

  async query(query: unknown): Promise<PopularityQueryResult> {
    const q = this.parseQuery(popularityQuerySchema, query);
    const model = await this.loadModel();
    if (!model) {
      return { result: [] };
    }

    const { blacklistEvents, returnSelf, num } = this.config;
    const exclude = new Set<string>();

    if (q.user !== undefined && blacklistEvents.length > 0) {
      const history = await this.ctx.datasets.list({ entityId: q.user, events: blacklistEvents });
      for (const event of history) {
        if (event.targetEntityId !== undefined) exclude.add(event.targetEntityId);
      }
    }

    if (q.item !== undefined && !returnSelf) {
      exclude.add(q.item);
    }

    const result = model.ranking
      .filter((ranked) => !exclude.has(ranked.item))
      .slice(0, q.num ?? num)
      .map((ranked): RankedItem => {
        const properties = model.properties[ranked.item];
        return properties ? { ...ranked, properties } : ranked;
      });

    return { result };
  }

  async handleReservedEvent(event: Event): Promise<void> {
    if (event.event === '$delete') {
      throw new UnsupportedOperationError(this.ctx.engineId, '$delete', 'items cannot be removed from a trained model');
    }

    if (event.entityType !== 'item') {
      this.ctx.logger.debug('Ignoring property change for non-item entity', {
        entityType: event.entityType,
        entityId: event.entityId,
      });
      return;
    }

    const model: PopularityModel = (await this.loadModel()) ?? {
      ranking: [],
      properties: {},
      eventCount: 0,
    };
    const current = model.properties[event.entityId] ?? {};

    if (event.event === '$set') {
      model.properties[event.entityId] = { ...current, ...event.properties };
    } else {
      const next = { ...current };
      for (const key of Object.keys(event.properties)) {
        delete next[key];
      }
      model.properties[event.entityId] = next;
    }

    await this.ctx.models.put(model);
  }

  private async loadModel(): Promise<PopularityModel | null> {
    const stored = await this.ctx.models.get();
    if (!stored) {
      return null;
    }

    const parsed = popularityModelSchema.safeParse(stored.model);
    if (!parsed.success) {
      throw new Error('Stored model is not a popularity model');
    }
    return parsed.data;
  }
}
