// Engine contract
//
// Every pluggable algorithm implements Engine. The core never looks at the
// engine's class: it reads `capabilities` and calls the operations below.

import type {
  EngineCapabilities,
  Event,
  Id,
  ParameterTree,
  TrainingDiscipline,
} from '@enginehost/protocol';
import type { DatasetFilter, StoredModel } from '@enginehost/repositories';
import type { EngineLogger } from '../logger.js';

/**
 * An engine's own dataset, already scoped to its id.
 */
export interface DatasetStore {
  /** Returns the dataset size after the append */
  append(event: Event): Promise<number>;
  list(filter?: DatasetFilter): Promise<Event[]>;
  count(): Promise<number>;
  stream(filter?: DatasetFilter): AsyncIterable<Event>;
}

/**
 * An engine's committed model, already scoped to its id.
 */
export interface ModelStore {
  get(): Promise<StoredModel | null>;
  put(model: unknown): Promise<StoredModel>;
}

/**
 * What an engine gets from the host at init and on every update.
 */
export type EngineContext = {
  engineId: Id;
  /** The full parameter tree; engines extract and validate their own sections */
  params: ParameterTree;
  datasets: DatasetStore;
  models: ModelStore;
  logger: EngineLogger;
};

export interface Engine {
  readonly capabilities: EngineCapabilities;
  readonly discipline: TrainingDiscipline;

  /**
   * Validate parameters and prepare in-process state.
   * Must not leave anything behind if it throws.
   */
  init(ctx: EngineContext): Promise<void>;

  /**
   * Apply new parameters. Throw UnsupportedUpdateError to keep the old ones.
   * The dataset is never touched by an update.
   */
  update(ctx: EngineContext): Promise<void>;

  input(event: Event): Promise<void>;

  query(query: unknown): Promise<unknown>;

  /**
   * Build a new model from the dataset. Only called when
   * `capabilities.batchTrain` is set. The host commits the returned model.
   */
  train?(): Promise<unknown>;

  /**
   * Apply a `$set`, `$unset` or `$delete` event directly to model state.
   * Engines without this hook reject reserved events.
   */
  handleReservedEvent?(event: Event): Promise<void>;

  /**
   * Release in-process resources. Persisted dataset and model are cleared
   * by the host afterwards.
   */
  destroy(): Promise<void>;
}

/**
 * Builds a fresh, uninitialized engine.
 */
export type EngineFactory = () => Engine;
