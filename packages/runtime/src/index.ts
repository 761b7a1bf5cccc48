// @enginehost/runtime
// Engine lifecycle, routing, mirroring and training for a multi-tenant engine host

export { createEngineHost, type EngineHost, type EngineHostOptions } from './host.js';

// Error types
export {
  EngineHostError,
  ValidationError,
  UnsupportedOperationError,
  EngineNotFoundError,
  MirrorNotFoundError,
  DuplicateIdError,
  UnsupportedUpdateError,
  AlreadyTrainingError,
  StorageFailureError,
  AlgorithmFailureError,
  toErrorResponse,
  type ErrorResponse,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createLevelLogger,
  createCapturingLogger,
  type EngineLogger,
  type LogEntry,
  type LogLevel,
} from './logger.js';

export { KeyedMutex, SerialQueue } from './concurrency/index.js';

// Parameter store
export {
  parseParameterTree,
  parseAndValidate,
  extractSection,
  parseEngineParams,
} from './params/index.js';

// Engine contract and reference engines
export * from './engines/index.js';

export * from './mirror/index.js';
export * from './training/index.js';
export * from './admin/index.js';
export * from './router/index.js';
