// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type { EngineRepository } from './engine-repository.js';

export type { MirrorRepository } from './mirror-repository.js';

export type { DatasetRepository, DatasetFilter } from './dataset-repository.js';

export type { ModelRepository, StoredModel } from './model-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
