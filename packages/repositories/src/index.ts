// @enginehost/repositories
// Storage contracts for engine metadata, mirror logs, datasets and models.
//
// The runtime codes against the interfaces only. Postgres backs production,
// the in-memory context backs tests and database-less development, and the
// file mirror writes one NDJSON log per engine.

export * from './interfaces/index.js';
export * as postgres from './postgres/index.js';
export { FileMirrorRepository, createFileMirrorRepository } from './file/index.js';
export {
  createInMemoryRepositoryContext,
  createInMemoryMirrorRepository,
  matchesDatasetFilter,
  type InMemoryDataStore,
  type InMemoryRepositoryContext,
} from './in-memory/index.js';
