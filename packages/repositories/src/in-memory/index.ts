// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts.

import type { EngineMetadata, Event, MirrorRecord } from '@enginehost/protocol';
import type {
  TransactionalRepositoryContext,
  EngineRepository,
  MirrorRepository,
  DatasetRepository,
  DatasetFilter,
  ModelRepository,
  StoredModel,
  TransactionFn,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  engines: Map<string, EngineMetadata>;
  mirrorRecords: Map<string, MirrorRecord[]>;
  datasets: Map<string, Event[]>;
  models: Map<string, StoredModel>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

/**
 * Check an event against a dataset filter.
 */
export function matchesDatasetFilter(event: Event, filter: DatasetFilter = {}): boolean {
  if (filter.entityType !== undefined && event.entityType !== filter.entityType) {
    return false;
  }
  if (filter.entityId !== undefined && event.entityId !== filter.entityId) {
    return false;
  }
  if (filter.events && !filter.events.includes(event.event)) {
    return false;
  }
  return true;
}

/**
 * Create an in-memory mirror repository on its own, e.g. to stand in for a
 * file-backed log in tests.
 */
export function createInMemoryMirrorRepository(
  records: Map<string, MirrorRecord[]> = new Map()
): MirrorRepository {
  return {
    async append(record) {
      const log = records.get(record.engineId) ?? [];
      log.push(structuredClone(record));
      records.set(record.engineId, log);
    },
    async lastSequence(engineId) {
      const log = records.get(engineId) ?? [];
      return log.length > 0 ? log[log.length - 1].sequence : 0;
    },
    async count(engineId) {
      return records.get(engineId)?.length ?? 0;
    },
    async *stream(engineId, untilSequence) {
      const log = [...(records.get(engineId) ?? [])].sort((a, b) => a.sequence - b.sequence);
      for (const record of log) {
        if (untilSequence !== undefined && record.sequence > untilSequence) break;
        yield structuredClone(record);
      }
    },
  };
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * const host = createEngineHost({ repos });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.engines.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  // Data stores
  const engines = new Map<string, EngineMetadata>();
  const mirrorRecords = new Map<string, MirrorRecord[]>();
  const datasets = new Map<string, Event[]>();
  const models = new Map<string, StoredModel>();

  const engineRepo: EngineRepository = {
    async save(metadata) {
      engines.set(metadata.engineId, structuredClone(metadata));
      return structuredClone(metadata);
    },
    async get(engineId) {
      const metadata = engines.get(engineId);
      return metadata ? structuredClone(metadata) : null;
    },
    async list() {
      return Array.from(engines.values())
        .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
        .map((metadata) => structuredClone(metadata));
    },
    async delete(engineId) {
      return engines.delete(engineId);
    },
  };

  const datasetRepo: DatasetRepository = {
    async append(engineId, event) {
      const events = datasets.get(engineId) ?? [];
      events.push(structuredClone(event));
      datasets.set(engineId, events);
      return events.length;
    },
    async list(engineId, filter) {
      const matched = (datasets.get(engineId) ?? []).filter((e) => matchesDatasetFilter(e, filter));
      const limited = filter?.limit !== undefined ? matched.slice(0, filter.limit) : matched;
      return limited.map((e) => structuredClone(e));
    },
    async count(engineId) {
      return datasets.get(engineId)?.length ?? 0;
    },
    async *stream(engineId, filter) {
      for (const event of await datasetRepo.list(engineId, filter)) {
        yield event;
      }
    },
    async clear(engineId) {
      const removed = datasets.get(engineId)?.length ?? 0;
      datasets.delete(engineId);
      return removed;
    },
  };

  const modelRepo: ModelRepository = {
    async get(engineId) {
      const stored = models.get(engineId);
      return stored ? structuredClone(stored) : null;
    },
    async put(engineId, model) {
      const stored: StoredModel = {
        engineId,
        model: structuredClone(model),
        updatedAt: new Date().toISOString(),
      };
      models.set(engineId, stored);
      return structuredClone(stored);
    },
    async delete(engineId) {
      return models.delete(engineId);
    },
  };

  const context: InMemoryRepositoryContext = {
    engines: engineRepo,
    mirror: createInMemoryMirrorRepository(mirrorRecords),
    datasets: datasetRepo,
    models: modelRepo,
    async transaction<T>(fn: TransactionFn<T>): Promise<T> {
      // In-memory operations are synchronous per-call, so just execute
      return fn(context);
    },
    _data: {
      engines,
      mirrorRecords,
      datasets,
      models,
    },
    clear() {
      engines.clear();
      mirrorRecords.clear();
      datasets.clear();
      models.clear();
    },
  };

  return context;
}
