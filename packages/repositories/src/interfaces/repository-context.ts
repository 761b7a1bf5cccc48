import type { EngineRepository } from './engine-repository.js';
import type { MirrorRepository } from './mirror-repository.js';
import type { DatasetRepository } from './dataset-repository.js';
import type { ModelRepository } from './model-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Swap implementations (Postgres, in-memory) without changing the
 * consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = postgres.createTransactionalPgRepositoryContext(db);
 * const host = createEngineHost({ repos });
 * ```
 */
export interface RepositoryContext {
  readonly engines: EngineRepository;
  /** Shared store for engines mirrored with `mirrorType: "db"` */
  readonly mirror: MirrorRepository;
  readonly datasets: DatasetRepository;
  readonly models: ModelRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   * All repository operations within the function will be atomic.
   *
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
