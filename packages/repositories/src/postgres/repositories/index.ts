// Postgres repository implementations
export { PgEngineRepository } from './engine-repository.js';
export { PgMirrorRepository } from './mirror-repository.js';
export { PgDatasetRepository } from './dataset-repository.js';
export { PgModelRepository } from './model-repository.js';
export { createTransactionalPgRepositoryContext } from './context.js';
