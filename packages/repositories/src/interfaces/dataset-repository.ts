import type { Event, Id } from '@enginehost/protocol';

/**
 * Filter for reading an engine's dataset.
 */
export type DatasetFilter = {
  entityType?: string;
  entityId?: string;
  /** Restrict to these event names */
  events?: string[];
  limit?: number;
};

/**
 * Repository interface for engine datasets.
 *
 * A dataset is the accumulated, engine-private state derived from accepted
 * events. Every call is scoped by engine id; nothing crosses instances.
 */
export interface DatasetRepository {
  /**
   * Append an event to an engine's dataset.
   * @returns The dataset size after the append
   */
  append(engineId: Id, event: Event): Promise<number>;

  /**
   * Read events in insertion order.
   */
  list(engineId: Id, filter?: DatasetFilter): Promise<Event[]>;

  count(engineId: Id): Promise<number>;

  /**
   * Stream events in insertion order, for training over large datasets.
   */
  stream(engineId: Id, filter?: DatasetFilter): AsyncIterable<Event>;

  /**
   * Erase an engine's dataset.
   * @returns Number of events removed
   */
  clear(engineId: Id): Promise<number>;
}
