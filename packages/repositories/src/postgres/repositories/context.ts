import type { Database, DbExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgEngineRepository } from './engine-repository.js';
import { PgMirrorRepository } from './mirror-repository.js';
import { PgDatasetRepository } from './dataset-repository.js';
import { PgModelRepository } from './model-repository.js';

function buildRepositories(db: DbExecutor): RepositoryContext {
  return {
    engines: new PgEngineRepository(db),
    mirror: new PgMirrorRepository(db),
    datasets: new PgDatasetRepository(db),
    models: new PgModelRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Destroy uses this to remove dataset, model and metadata in one step:
 * ```ts
 * await repos.transaction(async (tx) => {
 *   await tx.datasets.clear(engineId);
 *   await tx.models.delete(engineId);
 *   await tx.engines.delete(engineId);
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly engines: PgEngineRepository;
  readonly mirror: PgMirrorRepository;
  readonly datasets: PgDatasetRepository;
  readonly models: PgModelRepository;

  constructor(private db: Database) {
    this.engines = new PgEngineRepository(db);
    this.mirror = new PgMirrorRepository(db);
    this.datasets = new PgDatasetRepository(db);
    this.models = new PgModelRepository(db);
  }

  /**
   * Run `fn` against repositories bound to a single transaction.
   * Throwing from `fn` rolls everything back and rethrows.
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return this.db.transaction(async (tx) => fn(buildRepositories(tx)));
  }
}
