// Training orchestrator
//
// Owns every per-instance mutation path:
// - inputs and reserved events go through one serial queue per instance
// - batch runs are detached from the caller; periodic runs proceed alongside
//   the input queue, mixed runs take their turn in it
// - state is idle | training | failed; a failed run keeps the previous model

import { randomUUID } from 'node:crypto';
import {
  disciplineOf,
  type Event,
  type Id,
  type TrainingJob,
  type TrainingState,
  type TrainingStatus,
  type TrainRequestResult,
} from '@enginehost/protocol';
import type { RepositoryContext } from '@enginehost/repositories';
import { SerialQueue } from '../concurrency/index.js';
import {
  AlgorithmFailureError,
  AlreadyTrainingError,
  EngineHostError,
  EngineNotFoundError,
  StorageFailureError,
  UnsupportedOperationError,
} from '../errors.js';
import { silentLogger, type EngineLogger } from '../logger.js';
import type { Engine } from '../engines/index.js';

const MAX_JOB_HISTORY = 20;

export type TrainingOrchestratorOptions = {
  repos: RepositoryContext;
  logger?: EngineLogger;
};

type Slot = {
  engine: Engine;
  state: TrainingState;
  queue: SerialQueue;
  running?: Promise<void>;
  /** A run dispatched outside the queue, while the engine was periodic */
  detachedRun?: Promise<void>;
  currentJob?: TrainingJob;
  jobs: TrainingJob[];
  lastError?: string;
  closed: boolean;
};

/**
 * Errors raised by engine code are reported as AlgorithmFailureError;
 * host errors an engine rethrows keep their kind.
 */
export function wrapEngineError(engineId: Id, operation: string, error: unknown): EngineHostError {
  if (error instanceof EngineHostError) {
    return error;
  }
  return new AlgorithmFailureError(engineId, operation, error);
}

export class TrainingOrchestrator {
  private readonly repos: RepositoryContext;
  private readonly logger: EngineLogger;
  private slots = new Map<Id, Slot>();

  constructor(options: TrainingOrchestratorOptions) {
    this.repos = options.repos;
    this.logger = options.logger ?? silentLogger;
  }

  attach(engineId: Id, engine: Engine): void {
    if (this.slots.has(engineId)) {
      throw new Error(`Engine already attached to orchestrator: ${engineId}`);
    }
    this.slots.set(engineId, {
      engine,
      state: 'idle',
      queue: new SerialQueue(),
      jobs: [],
      closed: false,
    });
  }

  isAttached(engineId: Id): boolean {
    const slot = this.slots.get(engineId);
    return slot !== undefined && !slot.closed;
  }

  /**
   * Queue an input behind everything already accepted for the instance.
   * Resolves once the engine has applied it.
   */
  submitInput(engineId: Id, event: Event): Promise<void> {
    const slot = this.openSlot(engineId);
    return this.enqueueMutation(slot, async () => {
      try {
        await slot.engine.input(event);
      } catch (error) {
        throw wrapEngineError(engineId, 'input', error);
      }
    });
  }

  /**
   * Queue a `$set`/`$unset`/`$delete` for the engine's own handler.
   */
  submitReservedEvent(engineId: Id, event: Event): Promise<void> {
    const slot = this.openSlot(engineId);
    const engine = slot.engine;
    if (!engine.capabilities.incrementalUpdate || !engine.handleReservedEvent) {
      throw new UnsupportedOperationError(engineId, event.event);
    }
    const handle = engine.handleReservedEvent.bind(engine);

    return this.enqueueMutation(slot, async () => {
      try {
        await handle(event);
      } catch (error) {
        throw wrapEngineError(engineId, event.event, error);
      }
    });
  }

  /**
   * Start a batch run. Returns as soon as the run is dispatched.
   *
   * @throws UnsupportedOperationError if the engine cannot batch train
   * @throws AlreadyTrainingError if a run is in flight
   */
  train(engineId: Id): TrainRequestResult {
    const slot = this.openSlot(engineId);
    const engine = slot.engine;
    const train = engine.train?.bind(engine);

    if (!engine.capabilities.batchTrain || !train) {
      throw new UnsupportedOperationError(engineId, 'train', 'engine has no batch training');
    }
    if (slot.state === 'training') {
      throw new AlreadyTrainingError(engineId, slot.currentJob?.jobId);
    }

    const job: TrainingJob = {
      jobId: randomUUID(),
      engineId,
      status: 'running',
      startedAt: new Date().toISOString(),
    };
    slot.state = 'training';
    slot.currentJob = job;
    this.remember(slot, job);

    const run = async (): Promise<void> => {
      this.logger.info('Training started', { engineId, jobId: job.jobId });
      try {
        let model: unknown;
        try {
          model = await train();
        } catch (error) {
          throw wrapEngineError(engineId, 'train', error);
        }

        try {
          await this.repos.models.put(engineId, model);
        } catch (error) {
          throw new StorageFailureError('model.commit', error, engineId);
        }

        job.status = 'succeeded';
        slot.state = 'idle';
        slot.lastError = undefined;
        this.logger.info('Training finished', { engineId, jobId: job.jobId });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        job.status = 'failed';
        job.error = message;
        slot.state = 'failed';
        slot.lastError = message;
        this.logger.error('Training failed', { engineId, jobId: job.jobId, error: message });
      } finally {
        job.finishedAt = new Date().toISOString();
        slot.currentJob = undefined;
      }
    };

    // Mixed engines must not apply incremental updates while a batch run reads the dataset
    const detached = disciplineOf(engine.capabilities) !== 'mixed';
    const running = detached ? run() : slot.queue.enqueue(run);
    slot.running = running;
    if (detached) {
      slot.detachedRun = running;
    }
    void running.then(() => {
      if (slot.running === running) {
        slot.running = undefined;
      }
      if (slot.detachedRun === running) {
        slot.detachedRun = undefined;
      }
    });

    return { status: 'accepted', jobId: job.jobId };
  }

  status(engineId: Id): TrainingStatus {
    const slot = this.slotFor(engineId);
    const lastJob = slot.jobs.find((job) => job.status !== 'running');

    return {
      engineId,
      state: slot.state,
      discipline: disciplineOf(slot.engine.capabilities),
      pendingInputs: slot.queue.pending,
      currentJob: slot.currentJob ? { ...slot.currentJob } : undefined,
      lastJob: lastJob ? { ...lastJob } : undefined,
      lastError: slot.lastError,
    };
  }

  /**
   * Recent jobs, newest first.
   */
  jobs(engineId: Id): TrainingJob[] {
    return this.slotFor(engineId).jobs.map((job) => ({ ...job }));
  }

  /**
   * Resolves once no input, reserved event or batch run is in flight.
   */
  async awaitIdle(engineId: Id): Promise<void> {
    const slot = this.slots.get(engineId);
    if (!slot) return;

    while (slot.queue.pending > 0 || slot.running) {
      await slot.queue.drain();
      if (slot.running) {
        await slot.running;
      }
    }
  }

  /**
   * Stop accepting work for an instance, wait for in-flight work and forget it.
   */
  async detach(engineId: Id): Promise<void> {
    const slot = this.slots.get(engineId);
    if (!slot) return;

    slot.closed = true;
    await this.awaitIdle(engineId);
    this.slots.delete(engineId);
  }

  /**
   * Queue an incremental update. An engine that became mixed while a run
   * dispatched in periodic mode is still going waits for that run to commit.
   */
  private enqueueMutation(slot: Slot, task: () => Promise<void>): Promise<void> {
    return slot.queue.enqueue(async () => {
      if (slot.detachedRun && disciplineOf(slot.engine.capabilities) === 'mixed') {
        await slot.detachedRun;
      }
      await task();
    });
  }

  private remember(slot: Slot, job: TrainingJob): void {
    slot.jobs.unshift(job);
    if (slot.jobs.length > MAX_JOB_HISTORY) {
      slot.jobs.length = MAX_JOB_HISTORY;
    }
  }

  private slotFor(engineId: Id): Slot {
    const slot = this.slots.get(engineId);
    if (!slot) {
      throw new EngineNotFoundError(engineId);
    }
    return slot;
  }

  private openSlot(engineId: Id): Slot {
    const slot = this.slotFor(engineId);
    if (slot.closed) {
      throw new EngineNotFoundError(engineId);
    }
    return slot;
  }
}
