// Continuous reference engine: per-event-name counts, updated on every input

import { z } from 'zod';
import type { EngineCapabilities, Event } from '@enginehost/protocol';
import { UnsupportedUpdateError } from '../../errors.js';
import { BaseEngine } from '../base-engine.js';

export const COUNTER_ENGINE_TYPE = 'reference.counter';

export const counterAlgorithmSchema = z
  .object({
    /** Only these event names are counted; every event still enters the dataset */
    eventNames: z.array(z.string().min(1)).min(1).optional(),
  })
  .passthrough();

export type CounterAlgorithm = z.output<typeof counterAlgorithmSchema>;

const counterModelSchema = z.object({
  counts: z.record(z.number().int().nonnegative()),
  total: z.number().int().nonnegative(),
});

export type CounterModel = z.output<typeof counterModelSchema>;

const counterQuerySchema = z.object({
  event: z.string().min(1).optional(),
});

export type CounterQueryResult =
  | { counts: Record<string, number>; total: number }
  | { event: string; count: number };

function sameNames(a?: string[], b?: string[]): boolean {
  const left = [...(a ?? [])].sort();
  const right = [...(b ?? [])].sort();
  return left.length === right.length && left.every((name, i) => name === right[i]);
}

export class CounterEngine extends BaseEngine<CounterAlgorithm> {
  readonly capabilities: EngineCapabilities = { incrementalUpdate: true, batchTrain: false };

  protected readonly algorithmSchema = counterAlgorithmSchema;

  async input(event: Event): Promise<void> {
    await this.ctx.datasets.append(event);

    const { eventNames } = this.config;
    if (eventNames && !eventNames.includes(event.event)) {
      return;
    }

    const model = await this.loadModel();
    model.counts[event.event] = (model.counts[event.event] ?? 0) + 1;
    model.total += 1;
    await this.ctx.models.put(model);
  }

  async query(query: unknown): Promise<CounterQueryResult> {
    const { event } = this.parseQuery(counterQuerySchema, query);
    const model = await this.loadModel();

    if (event !== undefined) {
      return { event, count: model.counts[event] ?? 0 };
    }
    return { counts: model.counts, total: model.total };
  }

  protected assertUpdatable(previous: CounterAlgorithm, next: CounterAlgorithm): void {
    // Counts already folded into the model cannot be re-attributed
    if (!sameNames(previous.eventNames, next.eventNames)) {
      throw new UnsupportedUpdateError(
        this.ctx.engineId,
        'algorithm.eventNames cannot change on a continuous engine',
        'algorithm.eventNames'
      );
    }
  }

  private async loadModel(): Promise<CounterModel> {
    const stored = await this.ctx.models.get();
    if (!stored) {
      return { counts: {}, total: 0 };
    }

    const parsed = counterModelSchema.safeParse(stored.model);
    if (!parsed.success) {
      throw new Error('Stored model is not a counter model');
    }
    return parsed.data;
  }
}
