import type { z } from 'zod';
import {
  disciplineOf,
  validateWithSchema,
  type EngineCapabilities,
  type Event,
  type ParameterTree,
  type TrainingDiscipline,
} from '@enginehost/protocol';
import { ValidationError } from '../errors.js';
import { extractSection } from '../params/index.js';
import type { Engine, EngineContext } from './contract.js';

/**
 * Common plumbing for engines configured by an `algorithm` section.
 *
 * The section is parsed on init and on every update; a new configuration is
 * only adopted once it has validated and passed `assertUpdatable`.
 */
export abstract class BaseEngine<TAlgorithm> implements Engine {
  abstract readonly capabilities: EngineCapabilities;

  protected abstract readonly algorithmSchema: z.ZodType<TAlgorithm, z.ZodTypeDef, unknown>;

  private current?: { ctx: EngineContext; config: TAlgorithm };

  get discipline(): TrainingDiscipline {
    return disciplineOf(this.capabilities);
  }

  protected get ctx(): EngineContext {
    if (!this.current) {
      throw new Error('Engine used before init');
    }
    return this.current.ctx;
  }

  protected get config(): TAlgorithm {
    if (!this.current) {
      throw new Error('Engine used before init');
    }
    return this.current.config;
  }

  protected get initialized(): boolean {
    return this.current !== undefined;
  }

  async init(ctx: EngineContext): Promise<void> {
    const config = this.parseAlgorithm(ctx.params);
    this.current = { ctx, config };
  }

  async update(ctx: EngineContext): Promise<void> {
    const next = this.parseAlgorithm(ctx.params);
    this.assertUpdatable(this.config, next);
    this.current = { ctx, config: next };
    ctx.logger.debug('Engine configuration updated');
  }

  /**
   * Throw UnsupportedUpdateError to refuse a configuration change.
   */
  protected assertUpdatable(_previous: TAlgorithm, _next: TAlgorithm): void {}

  protected parseAlgorithm(params: ParameterTree): TAlgorithm {
    return extractSection(params, 'algorithm', this.algorithmSchema);
  }

  /**
   * Validate a query body, failing with a ValidationError under `query.*`.
   */
  protected parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.output<S> {
    const result = validateWithSchema(schema, query ?? {});
    if (!result.valid) {
      const first = result.errors[0];
      const field = first.path ? `query.${first.path}` : 'query';
      throw new ValidationError(`Invalid query "${field}": ${first.message}`, {
        field,
        details: { errors: result.errors },
      });
    }
    return result.value;
  }

  abstract input(event: Event): Promise<void>;

  abstract query(query: unknown): Promise<unknown>;

  async destroy(): Promise<void> {
    this.current = undefined;
  }
}
