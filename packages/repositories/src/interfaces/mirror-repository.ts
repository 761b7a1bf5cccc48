import type { Id, MirrorRecord, TornLine } from '@enginehost/protocol';

/**
 * Repository interface for mirror logs.
 *
 * Mirror logs are append-only archives of accepted events, one per engine.
 * They are never read while serving; they exist so an engine's dataset can be
 * rebuilt by replay. Sequence numbers are assigned by the caller.
 */
export interface MirrorRepository {
  /**
   * Append a record. Must be durable when the promise resolves.
   */
  append(record: MirrorRecord): Promise<void>;

  /**
   * Highest sequence number stored for an engine, 0 if none.
   */
  lastSequence(engineId: Id): Promise<number>;

  /**
   * Count records stored for an engine.
   */
  count(engineId: Id): Promise<number>;

  /**
   * Stream an engine's records in ascending sequence order.
   * @param untilSequence Stop after this sequence (inclusive)
   */
  stream(engineId: Id, untilSequence?: number): AsyncIterable<MirrorRecord>;

  /**
   * Partial records left by appends that never completed, in file order.
   * Backends with atomic appends leave this out.
   */
  tornWrites?(engineId: Id): Promise<TornLine[]>;
}
