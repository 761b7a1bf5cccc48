import type { EngineMetadata, Id } from '@enginehost/protocol';

/**
 * Repository interface for persisted engine metadata.
 *
 * One record per instance. The administrator writes it on create/update,
 * deletes it on destroy, and reads the full set back on restart.
 */
export interface EngineRepository {
  /**
   * Insert or replace the metadata for an engine.
   */
  save(metadata: EngineMetadata): Promise<EngineMetadata>;

  /**
   * @returns Metadata or null if not found
   */
  get(engineId: Id): Promise<EngineMetadata | null>;

  /**
   * All persisted engines, ordered by creation time.
   */
  list(): Promise<EngineMetadata[]>;

  /**
   * @returns true if a record was removed
   */
  delete(engineId: Id): Promise<boolean>;
}
