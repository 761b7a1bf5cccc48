// Router - dispatches boundary calls to the right engine instance
//
// Holds no engine state of its own. Acceptance of an input (mirror write,
// then hand-off to the orchestrator) runs under the administrator's
// admission lock, so the mirror log order is the order the engine sees and a
// mirrored event is never orphaned by a concurrent destroy.

import {
  isReservedEvent,
  validateEventInput,
  type Event,
  type Id,
  type TrainingStatus,
  type TrainRequestResult,
} from '@enginehost/protocol';
import { UnsupportedOperationError, ValidationError } from '../errors.js';
import { silentLogger, type EngineLogger } from '../logger.js';
import type { EngineAdministrator } from '../admin/index.js';
import type { MirrorLog, ReplayReport } from '../mirror/index.js';
import { wrapEngineError, type TrainingOrchestrator } from '../training/index.js';

export type EngineRouterOptions = {
  admin: EngineAdministrator;
  orchestrator: TrainingOrchestrator;
  mirror: MirrorLog;
  logger?: EngineLogger;
};

export type InputResult = {
  accepted: true;
  /** Mirror sequence number, when the instance is mirrored */
  sequence?: number;
};

type Settled = { ok: true } | { ok: false; error: unknown };

export class EngineRouter {
  private readonly admin: EngineAdministrator;
  private readonly orchestrator: TrainingOrchestrator;
  private readonly mirror: MirrorLog;
  private readonly logger: EngineLogger;

  constructor(options: EngineRouterOptions) {
    this.admin = options.admin;
    this.orchestrator = options.orchestrator;
    this.mirror = options.mirror;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Validate, mirror and apply one event.
   *
   * @throws EngineNotFoundError if the id is not live
   * @throws ValidationError before anything is written
   * @throws StorageFailureError if the mirror write fails; the event is not accepted
   * @throws AlgorithmFailureError if the engine fails to apply it
   */
  async input(engineId: Id, input: unknown): Promise<InputResult> {
    this.admin.lookup(engineId);

    const result = validateEventInput(input);
    if (!result.valid) {
      const first = result.errors[0];
      throw new ValidationError(`Invalid event field "${first.path}": ${first.message}`, {
        field: first.path,
        details: { errors: result.errors },
      });
    }

    const creationTime = new Date().toISOString();
    const event: Event = {
      ...result.value,
      eventTime: result.value.eventTime ?? creationTime,
      creationTime,
    };

    return this.accept(engineId, event, true);
  }

  /**
   * Run a query. Queries are not serialized against inputs.
   */
  async query(engineId: Id, query: unknown): Promise<unknown> {
    const engine = this.admin.lookup(engineId);
    try {
      return await engine.query(query);
    } catch (error) {
      throw wrapEngineError(engineId, 'query', error);
    }
  }

  async train(engineId: Id): Promise<TrainRequestResult> {
    this.admin.lookup(engineId);
    const result = this.orchestrator.train(engineId);
    this.logger.debug('Training requested', { engineId, jobId: result.jobId });
    return result;
  }

  trainingStatus(engineId: Id): TrainingStatus {
    this.admin.lookup(engineId);
    return this.orchestrator.status(engineId);
  }

  /**
   * Feed `sourceId`'s mirror log through `sinkId`'s input path.
   * Replaying an instance into itself does not mirror the events again.
   */
  async replay(sourceId: Id, sinkId: Id): Promise<ReplayReport> {
    this.admin.lookup(sinkId);
    return this.mirror.replayInto(sourceId, sinkId, (event) =>
      this.accept(sinkId, event, sinkId !== sourceId)
    );
  }

  private async accept(engineId: Id, event: Event, mirror: boolean): Promise<InputResult> {
    const engine = this.admin.lookup(engineId);
    const reserved = isReservedEvent(event.event);

    if (reserved && !(engine.capabilities.incrementalUpdate && engine.handleReservedEvent)) {
      throw new UnsupportedOperationError(engineId, event.event, 'engine does not apply reserved events');
    }

    const { sequence, applied } = await this.admin.admit(engineId, async () => {
      const record = mirror && this.mirror.isEnabled(engineId)
        ? await this.mirror.record(engineId, event)
        : undefined;

      const pending = reserved
        ? this.orchestrator.submitReservedEvent(engineId, event)
        : this.orchestrator.submitInput(engineId, event);

      // Settle now so a failure surfaces through this call, not as an unhandled rejection
      const applied = pending.then(
        (): Settled => ({ ok: true }),
        (error: unknown): Settled => ({ ok: false, error })
      );

      return { sequence: record?.sequence, applied };
    });

    const outcome = await applied;
    if (!outcome.ok) {
      throw outcome.error;
    }

    return sequence === undefined ? { accepted: true } : { accepted: true, sequence };
  }
}
