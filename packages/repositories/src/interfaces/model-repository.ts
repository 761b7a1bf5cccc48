import type { Id, Timestamp } from '@enginehost/protocol';

/**
 * A committed model artifact. The content is opaque to the core.
 */
export type StoredModel = {
  engineId: Id;
  model: unknown;
  updatedAt: Timestamp;
};

/**
 * Repository interface for committed models, one per engine.
 */
export interface ModelRepository {
  /**
   * @returns The committed model or null if the engine has never trained
   */
  get(engineId: Id): Promise<StoredModel | null>;

  /**
   * Replace the committed model.
   */
  put(engineId: Id, model: unknown): Promise<StoredModel>;

  /**
   * @returns true if a model was removed
   */
  delete(engineId: Id): Promise<boolean>;
}
