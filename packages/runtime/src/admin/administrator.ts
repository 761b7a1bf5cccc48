// Engine administrator
//
// The single owner of live engine instances. Structural operations
// (create, update, destroy) serialize per engine id; different ids proceed
// concurrently. Everything else reaches an engine through lookup().

import {
  disciplineOf,
  type EngineInstance,
  type EngineMetadata,
  type EngineParams,
  type Id,
  type ParameterTree,
  type TrainingStatus,
} from '@enginehost/protocol';
import type { TransactionalRepositoryContext } from '@enginehost/repositories';
import { KeyedMutex } from '../concurrency/index.js';
import {
  AlgorithmFailureError,
  DuplicateIdError,
  EngineNotFoundError,
  StorageFailureError,
  UnsupportedUpdateError,
  ValidationError,
} from '../errors.js';
import { silentLogger, type EngineLogger } from '../logger.js';
import { parseEngineParams, parseParameterTree } from '../params/index.js';
import {
  createEngineContext,
  type Engine,
  type EngineContext,
  type EngineFactoryRegistry,
} from '../engines/index.js';
import type { MirrorInfo, MirrorLog } from '../mirror/index.js';
import { wrapEngineError, type TrainingOrchestrator } from '../training/index.js';

export type EngineAdministratorOptions = {
  repos: TransactionalRepositoryContext;
  factories: EngineFactoryRegistry;
  mirror: MirrorLog;
  orchestrator: TrainingOrchestrator;
  logger?: EngineLogger;
};

export type RestoreFailure = {
  engineId: Id;
  error: string;
};

export type RestoreReport = {
  restored: Id[];
  failed: RestoreFailure[];
};

export type EngineStatus = {
  instance: EngineInstance;
  training: TrainingStatus;
  mirror: MirrorInfo;
  datasetSize: number;
};

type LiveEngine = {
  instance: EngineInstance;
  engine: Engine;
  context: EngineContext;
};

export class EngineAdministrator {
  private readonly repos: TransactionalRepositoryContext;
  private readonly factories: EngineFactoryRegistry;
  private readonly mirror: MirrorLog;
  private readonly orchestrator: TrainingOrchestrator;
  private readonly logger: EngineLogger;

  private live = new Map<Id, LiveEngine>();
  private locks = new KeyedMutex();
  /** Held while an input is mirrored and handed to the orchestrator */
  private admission = new KeyedMutex();

  constructor(options: EngineAdministratorOptions) {
    this.repos = options.repos;
    this.factories = options.factories;
    this.mirror = options.mirror;
    this.orchestrator = options.orchestrator;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Build, initialize and persist a new engine instance.
   *
   * @returns the new instance's id
   * @throws ValidationError for malformed params or an unknown factory
   * @throws DuplicateIdError if the id is already live
   */
  async create(params: unknown): Promise<Id> {
    const tree = parseParameterTree(params);
    const parsed = parseEngineParams(tree);

    return this.locks.run(parsed.engineId, async () => {
      const now = new Date().toISOString();
      await this.build(tree, parsed, { createdAt: now, updatedAt: now, persist: true });
      this.logger.info('Engine created', {
        engineId: parsed.engineId,
        engineFactory: parsed.engineFactory,
      });
      return parsed.engineId;
    });
  }

  /**
   * Apply new parameters to a live instance. The dataset is never touched.
   *
   * @throws EngineNotFoundError if the id is not live
   * @throws UnsupportedUpdateError if the engine refuses the change; the
   * previous configuration stays active
   */
  async update(engineId: Id, params: unknown): Promise<EngineInstance> {
    return this.locks.run(engineId, async () => {
      const live = this.require(engineId);
      const tree = parseParameterTree(params);
      const parsed = parseEngineParams(tree);

      if (parsed.engineId !== engineId) {
        throw new ValidationError(`engineId "${parsed.engineId}" does not match ${engineId}`, {
          field: 'engineId',
        });
      }
      if (parsed.engineFactory !== live.instance.engineType) {
        throw new UnsupportedUpdateError(engineId, 'engineFactory cannot change', 'engineFactory');
      }

      const previous = live.context;
      const next = this.contextFor(engineId, tree);
      live.instance.state = 'updating';
      this.logger.info('Engine updating', { engineId });

      try {
        try {
          await live.engine.update(next);
        } catch (error) {
          throw wrapEngineError(engineId, 'update', error);
        }

        const updatedAt = new Date().toISOString();
        try {
          await this.repos.engines.save(this.metadataFor(parsed, tree, live.instance.createdAt, updatedAt));
        } catch (error) {
          await this.revert(live, previous);
          throw new StorageFailureError('metadata.save', error, engineId);
        }

        live.context = next;
        live.instance.params = tree;
        live.instance.updatedAt = updatedAt;
        this.mirror.configure(engineId, parsed);
      } finally {
        live.instance.state = 'active';
      }

      live.instance.trainingDiscipline = live.engine.discipline;
      this.logger.info('Engine updated', { engineId });
      return this.snapshot(live);
    });
  }

  /**
   * Remove an instance: stop routing to it, wait for in-flight work, release
   * the engine, then clear its dataset, model and metadata. The mirror log
   * is kept so the instance can be rebuilt.
   */
  async destroy(engineId: Id): Promise<void> {
    return this.locks.run(engineId, async () => {
      // An input already admitted is applied before the engine goes away
      const live = await this.admission.run(engineId, async () => {
        const admitted = this.require(engineId);
        this.live.delete(engineId);
        admitted.instance.state = 'destroyed';
        return admitted;
      });
      this.logger.info('Engine destroying', { engineId });

      await this.orchestrator.detach(engineId);

      let engineError: unknown;
      try {
        await live.engine.destroy();
      } catch (error) {
        engineError = error;
        this.logger.error('Engine failed to release resources', {
          engineId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      this.mirror.release(engineId);

      try {
        await this.repos.transaction(async (tx) => {
          await tx.datasets.clear(engineId);
          await tx.models.delete(engineId);
          await tx.engines.delete(engineId);
        });
      } catch (error) {
        throw new StorageFailureError('destroy', error, engineId);
      }

      this.logger.info('Engine destroyed', { engineId });

      if (engineError !== undefined) {
        throw new AlgorithmFailureError(engineId, 'destroy', engineError);
      }
    });
  }

  /**
   * Rebuild every persisted instance. A failing instance is logged and
   * skipped; the rest are still restored.
   */
  async restoreAll(): Promise<RestoreReport> {
    const report: RestoreReport = { restored: [], failed: [] };

    let all: EngineMetadata[];
    try {
      all = await this.repos.engines.list();
    } catch (error) {
      throw new StorageFailureError('metadata.list', error);
    }

    for (const metadata of all) {
      const engineId = metadata.engineId;
      try {
        await this.locks.run(engineId, async () => {
          if (this.live.has(engineId)) return;

          const tree = parseParameterTree(metadata.params);
          const parsed = parseEngineParams(tree);
          if (parsed.engineId !== engineId) {
            throw new ValidationError(`Stored params name ${parsed.engineId}`, { field: 'engineId' });
          }
          await this.build(tree, parsed, {
            createdAt: metadata.createdAt,
            updatedAt: metadata.updatedAt,
            persist: false,
          });
        });
        report.restored.push(engineId);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        report.failed.push({ engineId, error: message });
        this.logger.error('Engine restore failed', { engineId, error: message });
      }
    }

    this.logger.info('Engines restored', {
      restored: report.restored.length,
      failed: report.failed.length,
    });
    return report;
  }

  /**
   * The running engine for an id, for the router.
   *
   * @throws EngineNotFoundError if the id is not live (including mid-destroy)
   */
  lookup(engineId: Id): Engine {
    return this.require(engineId).engine;
  }

  /**
   * Run `task` against the live engine while no destroy can remove it.
   * Everything `task` hands to the orchestrator is applied before destroy
   * releases the engine.
   *
   * @throws EngineNotFoundError if the id is not live once admission is granted
   */
  async admit<T>(engineId: Id, task: (engine: Engine) => Promise<T>): Promise<T> {
    return this.admission.run(engineId, () => task(this.lookup(engineId)));
  }

  has(engineId: Id): boolean {
    return this.live.has(engineId);
  }

  get(engineId: Id): EngineInstance {
    return this.snapshot(this.require(engineId));
  }

  list(): EngineInstance[] {
    return Array.from(this.live.values())
      .map((live) => this.snapshot(live))
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  async status(engineId: Id): Promise<EngineStatus> {
    const live = this.require(engineId);
    return {
      instance: this.snapshot(live),
      training: this.orchestrator.status(engineId),
      mirror: this.mirror.describe(engineId),
      datasetSize: await live.context.datasets.count(),
    };
  }

  /**
   * Wait for in-flight work and release every engine. Persisted data stays.
   */
  async shutdown(): Promise<void> {
    const ids = Array.from(this.live.keys());

    await Promise.all(
      ids.map((engineId) =>
        this.locks.run(engineId, async () => {
          const live = await this.admission.run(engineId, async () => {
            const admitted = this.live.get(engineId);
            this.live.delete(engineId);
            return admitted;
          });
          if (!live) return;

          await this.orchestrator.detach(engineId);
          this.mirror.release(engineId);
          try {
            await live.engine.destroy();
          } catch (error) {
            this.logger.warn('Engine failed to release resources on shutdown', {
              engineId,
              error: error instanceof Error ? error.message : String(error),
            });
          }
        })
      )
    );

    this.logger.info('Engines shut down', { count: ids.length });
  }

  private async build(
    tree: ParameterTree,
    parsed: EngineParams,
    options: { createdAt: string; updatedAt: string; persist: boolean }
  ): Promise<void> {
    const engineId = parsed.engineId;

    if (this.live.has(engineId)) {
      throw new DuplicateIdError(engineId);
    }

    const factory = this.factories.get(parsed.engineFactory);
    if (!factory) {
      throw new ValidationError(`Unknown engine factory "${parsed.engineFactory}"`, {
        field: 'engineFactory',
        details: { known: this.factories.types() },
      });
    }

    const engine = factory();
    const context = this.contextFor(engineId, tree);

    try {
      await engine.init(context);
    } catch (error) {
      await this.discard(engineId, engine);
      throw wrapEngineError(engineId, 'init', error);
    }

    if (options.persist) {
      try {
        await this.repos.engines.save(this.metadataFor(parsed, tree, options.createdAt, options.updatedAt));
      } catch (error) {
        await this.discard(engineId, engine);
        throw new StorageFailureError('metadata.save', error, engineId);
      }
    }

    this.mirror.configure(engineId, parsed);
    this.orchestrator.attach(engineId, engine);
    this.live.set(engineId, {
      engine,
      context,
      instance: {
        id: engineId,
        engineType: parsed.engineFactory,
        params: tree,
        state: 'active',
        trainingDiscipline: disciplineOf(engine.capabilities),
        createdAt: options.createdAt,
        updatedAt: options.updatedAt,
      },
    });
  }

  // Half-built engines must not leave anything behind
  private async discard(engineId: Id, engine: Engine): Promise<void> {
    try {
      await engine.destroy();
    } catch (error) {
      this.logger.warn('Engine failed to release resources after a failed create', {
        engineId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async revert(live: LiveEngine, previous: EngineContext): Promise<void> {
    try {
      await live.engine.update(previous);
    } catch (error) {
      this.logger.error('Engine could not return to its previous configuration', {
        engineId: live.instance.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private contextFor(engineId: Id, params: ParameterTree): EngineContext {
    return createEngineContext({ engineId, params, repos: this.repos, logger: this.logger });
  }

  private metadataFor(
    parsed: EngineParams,
    params: ParameterTree,
    createdAt: string,
    updatedAt: string
  ): EngineMetadata {
    return {
      engineId: parsed.engineId,
      engineFactory: parsed.engineFactory,
      params,
      mirrorType: parsed.mirrorType,
      createdAt,
      updatedAt,
    };
  }

  private require(engineId: Id): LiveEngine {
    const live = this.live.get(engineId);
    if (!live) {
      throw new EngineNotFoundError(engineId);
    }
    return live;
  }

  private snapshot(live: LiveEngine): EngineInstance {
    return { ...live.instance, params: structuredClone(live.instance.params) };
  }
}
